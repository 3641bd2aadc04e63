import { parentPort, workerData } from "node:worker_threads";
import { sampleOcclusion, type OcclusionTask } from "./occlusion.js";

const task: OcclusionTask = workerData;
parentPort?.postMessage(sampleOcclusion(task.input, task.start, task.end));

import type { AxiosInstance } from "axios";
import { DockingPipeline } from "../docking/pipeline.js";
import { RenderSessionManager } from "../render/manager.js";
import { RenderController } from "../render/view.js";
import type { AppConfig } from "../runtime/config.js";
import type { ProcessLauncher } from "../runtime/process.js";
import { AlphaFoldProvider, createHttpClient, RcsbProvider } from "../store/providers.js";
import { StructureStore } from "../store/structureStore.js";
import type { ToolServices } from "./toolDefinition.js";

export interface ServiceOverrides {
  http?: AxiosInstance;
  launcher?: ProcessLauncher;
  now?: () => number;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): ToolServices {
  const http = overrides.http ?? createHttpClient(config.http);
  const store = new StructureStore({
    providers: [new RcsbProvider(http, config.http.rcsbDownloadUrl), new AlphaFoldProvider(http, config.http.alphafoldApiUrl)],
    maxEntries: config.cache.maxEntries,
    maxAtoms: config.cache.maxAtoms
  });
  const pipeline = new DockingPipeline({
    config: config.docking,
    scratchRoot: config.scratchDir,
    launcher: overrides.launcher,
    now: overrides.now
  });
  const sessions = new RenderSessionManager({
    config: config.render,
    scratchRoot: config.scratchDir,
    launcher: overrides.launcher,
    now: overrides.now
  });
  return { store, pipeline, sessions, viewer: new RenderController(sessions, store), pocketParallelism: config.pocketParallelism };
}

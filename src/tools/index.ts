import { dockLigandTool, generateCandidatesTool } from "./docking.tools.js";
import {
  closeSessionTool,
  highlightResiduesTool,
  mutateResidueTool,
  openStructureTool,
  rotateViewTool,
  setRepresentationTool,
  showDockingPoseTool,
  snapshotTool
} from "./render.tools.js";
import { fetchStructureTool, findPocketsTool, listResiduesTool } from "./structure.tools.js";
import type { RegisteredTool } from "./toolDefinition.js";

export const allToolDefinitions: readonly RegisteredTool[] = [
  // Structures and pockets
  fetchStructureTool,
  listResiduesTool,
  findPocketsTool,
  // Docking
  dockLigandTool,
  generateCandidatesTool,
  // Viewer
  openStructureTool,
  rotateViewTool,
  setRepresentationTool,
  mutateResidueTool,
  highlightResiduesTool,
  snapshotTool,
  showDockingPoseTool,
  closeSessionTool
];

export * from "./toolDefinition.js";

export * from "./types/structure.js";
export * from "./types/docking.js";
export * from "./runtime/errors.js";
export { loadConfig, type AppConfig, type DockingConfig, type RenderConfig } from "./runtime/config.js";
export type { ManagedProcess, ProcessExit, ProcessLauncher, ProcessSpec } from "./runtime/process.js";

export { parsePdb, type ParseOptions } from "./pdb/parse.js";
export { writePdb, type WriteOptions } from "./pdb/write.js";
export * from "./utils/structure.js";

export { StructureStore, type StructureStoreOptions, type StoreStats } from "./store/structureStore.js";
export { AlphaFoldProvider, RcsbProvider, createHttpClient, type StructureProvider } from "./store/providers.js";

export * from "./pockets/detect.js";
export { residuesNear } from "./pockets/contacts.js";
export { searchBoxForPocket, type SearchBox } from "./pockets/searchBox.js";

export { RenderSession, type SessionState, type ViewState, type SnapshotOptions } from "./render/session.js";
export { RenderSessionManager, type SessionInfo } from "./render/manager.js";
export { RenderController, type ViewResult } from "./render/view.js";
export { chimeraxDialect, type RenderDialect, type Axis, type Representation } from "./render/commands.js";

export { parseSmiles, isValidSmiles, type SmilesMolecule } from "./docking/smiles.js";
export { DockingPipeline, type DockingPipelineOptions } from "./docking/pipeline.js";
export { generateCandidates, type Candidate, type CandidateSet, type PocketCharacter } from "./docking/candidates.js";

export { createServer, callTool } from "./tools/server.js";
export { createServices } from "./tools/services.js";
export { allToolDefinitions } from "./tools/index.js";

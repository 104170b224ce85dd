export * as Git from "./git";
export * as Logger from "./logger";
export * as Validation from "./validation";
export * as Events from "./events";
export * as Config from "./sync_config";

// Sync engine
export * as SyncStore from "./sync_store";
export * as Workspace from "./workspace";
export * as Translator from "./translator";
export * as Classifier from "./classifier";
export * as BuildTool from "./build_tool";
export * as Tracker from "./tracker";
export * as Orchestrator from "./orchestrator";
export * as CiReactor from "./ci_reactor";

// Inbound deliveries and try runs
export * as Webhook from "./webhook";
export * as TryPush from "./try_push";

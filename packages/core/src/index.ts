export * as ChangeDetector from "./change_detector";
export * as Config from "./config";
export * as FingerprintStore from "./fingerprint_store";
export * as Git from "./git";
export * as Logger from "./logger";
export * as Pipeline from "./pipeline";
export * as RemoteWriter from "./remote_writer";
export * as RunLock from "./run_lock";
export * as Synchronizer from "./synchronizer";
export * as WorkingTree from "./working_tree";

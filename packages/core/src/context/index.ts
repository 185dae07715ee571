export { createFsContext } from "./taskdeck_context";
export type { FsContextOptions, TaskdeckContext } from "./taskdeck_context";

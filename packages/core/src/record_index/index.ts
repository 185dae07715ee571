export { RecordIndex, isArchivedEntry } from "./record_index";
export type { IndexEntry } from "./record_index";

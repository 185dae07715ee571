export type {
  IRecordStore,
  ReloadReport,
  StoreWarning,
  TransitionOptions,
} from "./record_store";
export { StoreIOError } from "./record_store.errors";
export { applyPatch, appendNote, coerceTags, NOTE_SEPARATOR } from "./record_patch";

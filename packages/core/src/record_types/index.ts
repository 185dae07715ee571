export * from "./record.types";

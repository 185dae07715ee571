export { encodeRecord, decodeRecord, splitHeaderAndBody, HEADER_DELIMITER } from "./record_codec";
export { toHeaderObject, KNOWN_HEADER_KEYS } from "./header_object";

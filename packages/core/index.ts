export type { BatchResult, Property, RawRow } from "./types";
export { type JsonResponse, writeJson } from "./utils/writer";
export { version } from "./version";

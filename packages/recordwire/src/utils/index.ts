export { generateId, generateUniqueId, type IdGenerator } from "./id";
export { err, isOk, ok, type Result } from "./result";
export { SerialQueue } from "./serial-queue";
export { isRecord } from "./guards";

/**
 * @healthlog/core - Formatting
 */

export { formatEntry } from "./display.js";
export { toRecord, fromRecord } from "./record.js";

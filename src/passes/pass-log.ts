/**
 * Pass logging.
 *
 * Activated by setting ONNX_PREPROCESS_LOG=1, or per call through
 * `PreprocessOptions.log`. When disabled the passes get a no-op logger.
 */

import type { IRGraph } from "../ir/graph";
import { printGraph } from "../ir/printer";

export const LOG_ENABLED =
  typeof process !== "undefined" && process.env?.ONNX_PREPROCESS_LOG === "1";

const PREFIX = "[onnx-preprocess]";

/** Receives one line per rewrite. */
export type PassLogger = (pass: string, message: string) => void;

export const consoleLogger: PassLogger = (pass, message) => {
  console.log(`${PREFIX} ${pass}: ${message}`);
};

export const silentLogger: PassLogger = () => {};

export function defaultLogger(): PassLogger {
  return LOG_ENABLED ? consoleLogger : silentLogger;
}

export function logGraphDump(label: string, graph: IRGraph): void {
  console.log(`${PREFIX} ${label}\n${printGraph(graph)}`);
}

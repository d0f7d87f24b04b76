/**
 * Export preprocessing pipeline.
 *
 * Runs the four rewrites over the whole graph, nested blocks included, in a
 * fixed order. Each pass finishes its traversal before the next starts: the
 * gather rewrite only sees unpacks that list fusion left behind.
 *
 * The graph is mutated in place. Nodes the rewrites leave without users (index
 * lists, drained unpacks) stay for the caller's dead-code elimination.
 */

import { lintGraph } from "../ir/lint";
import type { IRBlock, IRGraph } from "../ir/graph";
import { ADD_TO_CONCAT, replaceAddWithConcat } from "./add-to-concat";
import { FUSE_LIST_UNPACK, fuseWithListUnpack } from "./fuse-list-unpack";
import { INDEX_PUT_TO_MASKED, replaceIndexPutWithMasked } from "./index-put-to-masked";
import {
  consoleLogger,
  LOG_ENABLED,
  logGraphDump,
  type PassLogger,
  silentLogger,
} from "./pass-log";
import { fuseListAndListUnpack, UNPACK_TO_GATHER } from "./unpack-to-gather";

const VERIFY_ENABLED =
  typeof process !== "undefined" && process.env?.ONNX_PREPROCESS_VERIFY === "1";

export type PreprocessOptions = {
  /** Lint the graph before the first pass and after every pass. Defaults to ONNX_PREPROCESS_VERIFY=1. */
  verify?: boolean;
  /** Dump the graph around the pipeline and log each rewrite. Defaults to ONNX_PREPROCESS_LOG=1. */
  log?: boolean;
};

export type PreprocessPass = {
  name: string;
  run: (block: IRBlock, log: PassLogger) => number;
};

export const PREPROCESS_PASSES: readonly PreprocessPass[] = [
  { name: FUSE_LIST_UNPACK, run: fuseWithListUnpack },
  { name: ADD_TO_CONCAT, run: replaceAddWithConcat },
  { name: INDEX_PUT_TO_MASKED, run: replaceIndexPutWithMasked },
  { name: UNPACK_TO_GATHER, run: fuseListAndListUnpack },
];

export function preprocessForExport(
  graph: IRGraph,
  options: PreprocessOptions = {},
): void {
  const verify = options.verify ?? VERIFY_ENABLED;
  const logging = options.log ?? LOG_ENABLED;
  const log = logging ? consoleLogger : silentLogger;

  if (logging) {
    logGraphDump("before preprocessing", graph);
  }
  if (verify) {
    lintGraph(graph);
  }
  for (const pass of PREPROCESS_PASSES) {
    const rewrites = pass.run(graph.block, log);
    if (verify) {
      lintGraph(graph);
    }
    log(pass.name, rewrites === 1 ? "1 rewrite" : `${rewrites} rewrites`);
  }
  if (logging) {
    logGraphDump("after preprocessing", graph);
  }
}

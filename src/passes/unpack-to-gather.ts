/**
 * Turn each output of a `prim::ListUnpack` over a computed `int[]` (a shape
 * query, a slice, ...) into an explicit `onnx::Gather` at a constant index,
 * so every unpacked size stays traceable to its source list.
 *
 *   %2 : int[] = aten::size(%x)
 *   %a : int, %b : int = prim::ListUnpack(%2)
 *
 * becomes
 *
 *   %2 : int[] = aten::size(%x)
 *   %7 : Long() = onnx::Constant[value={0}]()
 *   %8 : Long() = onnx::Gather(%2, %7)
 *   %9 : Long() = onnx::Constant[value={1}]()
 *   %10 : Long() = onnx::Gather(%2, %9)
 *   %a : int, %b : int = prim::ListUnpack(%2)
 *
 * with every former user of `%a` / `%b` reading `%8` / `%10`. The unpack is
 * left behind without users; removing it is up to dead-code elimination.
 * Unpacks of a literal `prim::ListConstruct` are not touched.
 */

import type { IRBlock, IRNode, IRValue } from "../ir/graph";
import { valueRef } from "../ir/printer";
import { attr, onnx, prim } from "../ir/symbols";
import { isIntList, tensorOf } from "../ir/types";
import { rewriteBlock } from "../ir/walk";
import { defaultLogger, type PassLogger } from "./pass-log";

export const UNPACK_TO_GATHER = "unpack-to-gather";

/** The unpacked list when `node` unpacks a computed `int[]`. */
export function matchComputedIntListUnpack(node: IRNode): IRValue | undefined {
  if (node.kind !== prim.ListUnpack || node.inputs.length !== 1) {
    return undefined;
  }
  const list = node.input();
  if (list.node.kind === prim.ListConstruct) {
    return undefined;
  }
  return isIntList(list.type) ? list : undefined;
}

/**
 * Insert a Constant/Gather pair before `unpack` for every output that still
 * has users and redirect those users. Returns the number of outputs rewired.
 */
export function gatherUnpackedElements(unpack: IRNode, list: IRValue): number {
  const graph = unpack.graph;
  let rewired = 0;
  unpack.outputs.forEach((output, i) => {
    if (!output.hasUses()) {
      return;
    }
    const index = graph
      .create(onnx.Constant)
      .setTensor(attr.value, { dtype: "i64", shape: [], values: [i] })
      .insertBefore(unpack);
    index.output().setType(tensorOf("i64", []));

    const gather = graph.create(onnx.Gather, [list, index.output()]).insertBefore(unpack);
    gather.output().setType(tensorOf("i64", []));
    output.replaceAllUsesWith(gather.output());
    rewired++;
  });
  return rewired;
}

export function fuseListAndListUnpack(
  block: IRBlock,
  log: PassLogger = defaultLogger(),
): number {
  return rewriteBlock(block, (node) => {
    const list = matchComputedIntListUnpack(node);
    if (list === undefined) {
      return false;
    }
    const rewired = gatherUnpackedElements(node, list);
    if (rewired > 0) {
      log(UNPACK_TO_GATHER, `${valueRef(list)} -> ${rewired} gathers`);
    }
    return rewired > 0;
  });
}

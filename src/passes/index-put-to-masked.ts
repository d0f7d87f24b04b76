/**
 * Lower boolean-mask `aten::index_put_` to `aten::masked_fill` (scalar value)
 * or `aten::masked_scatter` (tensor value).
 *
 *   %22 : Tensor?[] = prim::ListConstruct(%mask)
 *   %23 : Float() = prim::Constant[value={1}]()
 *   %25 : Float(2, 2, 2) = aten::index_put_(%x, %22, %23, %24)
 *
 * becomes
 *
 *   %25 : Float(2, 2, 2) = aten::masked_fill(%x, %mask, %23)
 *
 * Only the first element of the index list is taken as the mask. The index
 * list itself is left in place.
 */

import type { IRBlock, IRNode, IRValue } from "../ir/graph";
import { valueRef } from "../ir/printer";
import { aten, prim } from "../ir/symbols";
import { tensorDType, tensorRank } from "../ir/types";
import { rewriteBlock } from "../ir/walk";
import { defaultLogger, type PassLogger } from "./pass-log";

export const INDEX_PUT_TO_MASKED = "index-put-to-masked";

export type MaskedAssignment = {
  kind: typeof aten.masked_fill | typeof aten.masked_scatter;
  mask: IRValue;
};

/**
 * Decide how to lower `node`, or return undefined when it is not a
 * boolean-mask index assignment with a value of known rank.
 */
export function matchMaskedIndexPut(node: IRNode): MaskedAssignment | undefined {
  if (node.kind !== aten.index_put_ || node.inputs.length < 3) {
    return undefined;
  }
  const indices = node.input(1).node;
  if (indices.kind !== prim.ListConstruct || indices.inputs.length === 0) {
    return undefined;
  }
  const mask = indices.input(0);
  if (tensorDType(mask.type) !== "bool") {
    return undefined;
  }

  const rank = tensorRank(node.input(2).type);
  if (rank === undefined) {
    return undefined;
  }
  return {
    kind: rank === 0 ? aten.masked_fill : aten.masked_scatter,
    mask,
  };
}

export function lowerMaskedIndexPut(node: IRNode, match: MaskedAssignment): IRNode {
  const masked = node.graph.create(match.kind).insertBefore(node);
  masked.addInput(node.input(0));
  masked.addInput(match.mask);
  masked.addInput(node.input(2));
  masked.output().copyMetadata(node.output());
  node.replaceAllUsesWith(masked);
  node.removeAllInputs();
  node.destroy();
  return masked;
}

export function replaceIndexPutWithMasked(
  block: IRBlock,
  log: PassLogger = defaultLogger(),
): number {
  return rewriteBlock(block, (node) => {
    const match = matchMaskedIndexPut(node);
    if (match === undefined) {
      return false;
    }
    const masked = lowerMaskedIndexPut(node, match);
    log(INDEX_PUT_TO_MASKED, `${valueRef(masked.output())} -> ${match.kind}`);
    return true;
  });
}

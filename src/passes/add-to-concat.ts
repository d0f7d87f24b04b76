/**
 * Replace `aten::add` over two `int[]` values (list concatenation) with
 * `onnx::Concat[axis=0]`.
 *
 *   %7 : int[] = aten::add(%l1, %l2)
 *   %8 : Tensor = aten::new_zeros(%x, %7, ...)
 *
 * becomes
 *
 *   %9 : Long() = onnx::Concat[axis=0](%l1, %l2)
 *   %8 : Tensor = aten::new_zeros(%x, %9, ...)
 *
 * Additions of tensors, or of lists whose elements are not `int`, are left
 * for the emitter.
 */

import { internalAssert } from "../errors";
import type { IRBlock, IRNode } from "../ir/graph";
import { valueRef } from "../ir/printer";
import { aten, attr, onnx } from "../ir/symbols";
import { type IRType, isIntegral, listElementType, tensorFromNumberType } from "../ir/types";
import { rewriteBlock } from "../ir/walk";
import { defaultLogger, type PassLogger } from "./pass-log";

export const ADD_TO_CONCAT = "add-to-concat";

/**
 * Element type of the first operand when `node` adds two lists and that
 * element type is `int`; undefined otherwise.
 */
export function matchListAddition(node: IRNode): IRType | undefined {
  if (node.kind !== aten.add || node.inputs.length !== 2) {
    return undefined;
  }
  const elem = listElementType(node.input(0).type);
  if (elem === undefined || listElementType(node.input(1).type) === undefined) {
    return undefined;
  }
  return isIntegral(elem) ? elem : undefined;
}

export function replaceAddWithConcatNode(node: IRNode, elem: IRType): IRNode {
  const type = tensorFromNumberType(elem);
  internalAssert(type !== undefined, () => `no tensor type for list element of ${node.kind}`);

  const concat = node.graph.create(onnx.Concat).setInt(attr.axis, 0).insertBefore(node);
  concat.addInput(node.input(0));
  concat.addInput(node.input(1));
  concat.output().setType(type);
  node.replaceAllUsesWith(concat);
  node.removeAllInputs();
  node.destroy();
  return concat;
}

export function replaceAddWithConcat(
  block: IRBlock,
  log: PassLogger = defaultLogger(),
): number {
  return rewriteBlock(block, (node) => {
    const elem = matchListAddition(node);
    if (elem === undefined) {
      return false;
    }
    const sum = valueRef(node.output());
    const concat = replaceAddWithConcatNode(node, elem);
    log(ADD_TO_CONCAT, `${sum} -> ${valueRef(concat.output())}`);
    return true;
  });
}

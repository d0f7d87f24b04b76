/**
 * Variadic-output fusion.
 *
 * Ops such as split/unbind produce a `Tensor[]` of statically known length
 * that is immediately destructured by `prim::ListUnpack`. The emitter has no
 * list type to hand the intermediate to, so the pair is fused: the producer
 * yields the unpacked values itself and records their count in `_outputs`.
 *
 *   %8 : Tensor[] = aten::split_with_sizes(%input, %13, %7)
 *   %9 : Float(2, 4, 3), %10 : Float(1, 4, 3), %11 : Float(2, 4, 3) = prim::ListUnpack(%8)
 *
 * becomes
 *
 *   %14 : Float(2, 4, 3), %15 : Float(1, 4, 3), %16 : Float(2, 4, 3) =
 *       aten::split_with_sizes[_outputs=3](%input, %13, %7)
 */

import { internalAssert } from "../errors";
import type { IRBlock, IRNode } from "../ir/graph";
import { valueRef } from "../ir/printer";
import { aten, attr, type OpKind, prim } from "../ir/symbols";
import { rewriteBlock } from "../ir/walk";
import { defaultLogger, type PassLogger } from "./pass-log";

export const FUSE_LIST_UNPACK = "fuse-list-unpack";

export const VARIADIC_OUTPUT_OPS: ReadonlySet<OpKind> = new Set<OpKind>([
  aten.split,
  aten.split_with_sizes,
  aten.unsafe_split,
  aten.unsafe_split_with_sizes,
  aten.unbind,
  aten.unsafe_chunk,
  aten.where,
]);

/**
 * The `prim::ListUnpack` that is the only consumer of `node`'s only output,
 * if there is one.
 */
export function findFusibleListUnpack(node: IRNode): IRNode | undefined {
  if (node.outputs.length !== 1) {
    return undefined;
  }
  const uses = node.output().uses;
  if (uses.length !== 1) {
    return undefined;
  }
  const user = uses[0].user;
  return user.kind === prim.ListUnpack ? user : undefined;
}

export function fuseNodeWithListUnpack(node: IRNode, unpack: IRNode): void {
  internalAssert(
    node.outputs.length === 1,
    () => `${node.kind} must have exactly one output to fuse, found ${node.outputs.length}`,
  );
  internalAssert(
    unpack.inputs.length === 1 && unpack.input() === node.output(),
    () => `${unpack.kind} #${unpack.id} does not unpack the output of ${node.kind}`,
  );

  const arity = unpack.outputs.length;
  node.setInt(attr.outputs, arity);
  for (const unpacked of unpack.outputs) {
    node.addOutput().copyMetadata(unpacked);
  }
  unpack.removeAllInputs();
  node.eraseOutput(0);
  unpack.replaceAllUsesWith(node);
  unpack.destroy();
}

export function fuseWithListUnpack(
  block: IRBlock,
  log: PassLogger = defaultLogger(),
): number {
  return rewriteBlock(block, (node) => {
    if (!VARIADIC_OUTPUT_OPS.has(node.kind)) {
      return false;
    }
    const unpack = findFusibleListUnpack(node);
    if (unpack === undefined) {
      return false;
    }
    const list = valueRef(node.output());
    fuseNodeWithListUnpack(node, unpack);
    log(FUSE_LIST_UNPACK, `${node.kind} ${list} -> ${node.outputs.length} outputs`);
    return true;
  });
}

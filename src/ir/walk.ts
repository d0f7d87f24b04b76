import { internalAssert } from "../errors";
import type { IRBlock, IRNode } from "./graph";

/**
 * Depth-first walk over `block`: for each node in list order, walk its nested
 * blocks first, then yield the node itself.
 *
 * The consumer may rewrite or destroy the yielded node before resuming. The
 * cursor resumes from the node's successor as it is after the rewrite, or,
 * when the node was destroyed, from the successor captured before the yield.
 * Nodes inserted in front of the yielded node are not visited.
 */
export function* walkBlock(block: IRBlock): Generator<IRNode, void, undefined> {
  const end = block.returnNode;
  let cursor = end.next;
  while (cursor !== null && cursor !== end) {
    const node: IRNode = cursor;
    for (const child of node.blocks) {
      yield* walkBlock(child);
    }
    const captured = node.next;
    yield node;
    cursor = node.alive ? node.next : captured;
    internalAssert(
      cursor === null || cursor.alive,
      () => `walk resumed on destroyed node ${cursor?.kind ?? "?"}`,
    );
  }
}

/**
 * Run `visit` on every node under `block` (nested blocks first), returning how
 * many times it reported a rewrite.
 */
export function rewriteBlock(
  block: IRBlock,
  visit: (node: IRNode) => boolean,
): number {
  let rewrites = 0;
  for (const node of walkBlock(block)) {
    if (visit(node)) {
      rewrites++;
    }
  }
  return rewrites;
}

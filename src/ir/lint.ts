import { GraphLintError } from "../errors";
import type { IRBlock, IRGraph, IRNode, IRValue } from "./graph";
import { printNode, valueRef } from "./printer";

/**
 * Check the structural invariants later stages rely on:
 *
 * - every node in a block list is live, owned by that block and linked both ways
 * - every value is defined exactly once, by the node whose outputs list it
 * - node inputs only reference values defined earlier in the same block or an
 *   enclosing one (topological order, lexical scoping)
 * - use lists match input lists exactly, in both directions
 * - everything reachable is registered in the graph's arena
 *
 * Throws `GraphLintError` describing the first violation.
 */
export function lintGraph(graph: IRGraph): void {
  const linter = new GraphLinter(graph);
  linter.checkBlock(graph.block, new Set());
  linter.checkUses();
}

class GraphLinter {
  private readonly defined = new Set<IRValue>();
  private readonly slotCounts = new Map<IRValue, number>();

  constructor(private readonly graph: IRGraph) {}

  checkBlock(block: IRBlock, outerScope: ReadonlySet<IRValue>): void {
    const scope = new Set(outerScope);
    this.checkOwnedNode(block.paramNode, block);
    this.checkOwnedNode(block.returnNode, block);
    if (block.paramNode.inputs.length > 0) {
      fail(`param node of ${blockLabel(block)} has inputs`);
    }
    for (const value of block.inputs) {
      this.define(value, block.paramNode);
      scope.add(value);
    }

    let prev = block.returnNode;
    for (const node of block.nodes()) {
      this.checkOwnedNode(node, block);
      if (node.prev !== prev) {
        fail(`broken back link before ${printNode(node)}`);
      }
      prev = node;
      this.checkInputs(node, scope);
      for (const child of node.blocks) {
        if (child.owningNode !== node) {
          fail(`block of ${node.kind} #${node.id} has the wrong owning node`);
        }
        this.checkBlock(child, scope);
      }
      for (const output of node.outputs) {
        this.define(output, node);
        scope.add(output);
      }
    }
    if (block.returnNode.prev !== prev) {
      fail(`broken back link at the end of ${blockLabel(block)}`);
    }
    this.checkInputs(block.returnNode, scope);
  }

  checkUses(): void {
    for (const value of this.defined) {
      const slots = this.slotCounts.get(value) ?? 0;
      if (value.uses.length !== slots) {
        fail(
          `${valueRef(value)} has ${value.uses.length} use records but appears in ${slots} input slots`,
        );
      }
      for (const use of value.uses) {
        if (!use.user.alive) {
          fail(`${valueRef(value)} is used by destroyed node ${use.user.kind}`);
        }
        if (use.user.inputs[use.offset] !== value) {
          fail(
            `${valueRef(value)} records a use at ${use.user.kind} input ${use.offset} that holds another value`,
          );
        }
      }
    }
  }

  private checkOwnedNode(node: IRNode, block: IRBlock): void {
    if (!node.alive) {
      fail(`destroyed node ${node.kind} #${node.id} is still reachable`);
    }
    if (node.owningBlock !== block) {
      fail(`${node.kind} #${node.id} is listed in a block it does not belong to`);
    }
    if (this.graph.nodeById(node.id) !== node) {
      fail(`${node.kind} #${node.id} is not registered with its graph`);
    }
  }

  private checkInputs(node: IRNode, scope: ReadonlySet<IRValue>): void {
    node.inputs.forEach((input, i) => {
      if (!input.alive) {
        fail(`input ${i} of ${node.kind} #${node.id} was destroyed`);
      }
      if (!scope.has(input)) {
        fail(
          `input ${i} of ${node.kind} #${node.id} (${valueRef(input)}) is not defined before its use`,
        );
      }
      this.slotCounts.set(input, (this.slotCounts.get(input) ?? 0) + 1);
    });
  }

  private define(value: IRValue, node: IRNode): void {
    if (this.defined.has(value)) {
      fail(`${valueRef(value)} is defined twice`);
    }
    if (value.node !== node || node.outputs[value.offset] !== value) {
      fail(`${valueRef(value)} does not match its defining node's outputs`);
    }
    if (this.graph.valueById(value.id) !== value) {
      fail(`${valueRef(value)} is not registered with its graph`);
    }
    this.defined.add(value);
  }
}

function blockLabel(block: IRBlock): string {
  const owner = block.owningNode;
  return owner === null ? "the graph block" : `a block of ${owner.kind} #${owner.id}`;
}

function fail(message: string): never {
  throw new GraphLintError(`graph lint: ${message}`);
}

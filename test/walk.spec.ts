import { describe, expect, it } from "vitest";

import {
  aten,
  InternalAssertError,
  IRGraph,
  type IRNode,
  prim,
  rewriteBlock,
  tensorOf,
  walkBlock,
} from "../src";
import { emit } from "./helpers/graphs";

function buildNested(): { graph: IRGraph; names: Map<IRNode, string> } {
  const graph = new IRGraph();
  const cond = graph.addInput(tensorOf("bool", []), "cond");
  const names = new Map<IRNode, string>();
  const named = (node: IRNode, name: string) => {
    names.set(node, name);
    return node;
  };

  named(emit(graph.block, aten.size, []), "A");
  const outer = named(emit(graph.block, prim.If, [cond], []), "If1");
  const thenBlock = outer.addBlock();
  named(emit(thenBlock, aten.size, []), "B");
  const inner = named(emit(thenBlock, prim.If, [cond], []), "If2");
  named(emit(inner.addBlock(), aten.size, []), "C");
  inner.addBlock();
  named(emit(outer.addBlock(), aten.size, []), "D");
  named(emit(graph.block, aten.size, []), "E");
  return { graph, names };
}

describe("walkBlock", () => {
  it("visits nested blocks before their owner", () => {
    const { graph, names } = buildNested();
    const order = Array.from(walkBlock(graph.block), (node) => names.get(node));

    expect(order).toEqual(["A", "B", "C", "If2", "D", "If1", "E"]);
  });

  it("can be restarted", () => {
    const { graph } = buildNested();
    const first = Array.from(walkBlock(graph.block));
    const second = Array.from(walkBlock(graph.block));

    expect(second).toEqual(first);
    expect(first).toHaveLength(7);
  });

  it("continues past a node destroyed during the visit", () => {
    const graph = new IRGraph();
    const a = emit(graph.block, aten.size, []);
    const b = emit(graph.block, aten.add, []);
    const c = emit(graph.block, aten.slice, []);

    const seen: IRNode[] = [];
    for (const node of walkBlock(graph.block)) {
      seen.push(node);
      if (node === b) {
        node.destroy();
      }
    }

    expect(seen).toEqual([a, b, c]);
    expect(graph.block.nodes()).toEqual([a, c]);
  });

  it("does not visit nodes inserted before the current node", () => {
    const graph = new IRGraph();
    const a = emit(graph.block, aten.add, []);
    const b = emit(graph.block, aten.slice, []);

    const seen: IRNode[] = [];
    for (const node of walkBlock(graph.block)) {
      seen.push(node);
      if (node.kind === aten.add) {
        graph.create(aten.size).insertBefore(node);
        node.destroy();
      }
    }

    expect(seen).toEqual([a, b]);
    expect(graph.block.nodes().map((node) => node.kind)).toEqual([aten.size, aten.slice]);
  });

  it("resumes from the live successor when a later node is destroyed", () => {
    const graph = new IRGraph();
    const a = emit(graph.block, aten.size, []);
    const b = emit(graph.block, aten.add, []);
    const c = emit(graph.block, aten.slice, []);

    const seen: IRNode[] = [];
    for (const node of walkBlock(graph.block)) {
      seen.push(node);
      if (node === a) {
        b.destroy();
      }
    }

    expect(seen).toEqual([a, c]);
  });

  it("fails when both the node and its successor are destroyed", () => {
    const graph = new IRGraph();
    const a = emit(graph.block, aten.size, []);
    const b = emit(graph.block, aten.add, []);
    emit(graph.block, aten.slice, []);

    const walk = () => {
      for (const node of walkBlock(graph.block)) {
        if (node === a) {
          b.destroy();
          a.destroy();
        }
      }
    };

    expect(walk).toThrow(InternalAssertError);
  });

  it("walks the body of a loop before the loop", () => {
    const graph = new IRGraph();
    const loop = emit(graph.block, prim.Loop, [], []);
    const body = loop.addBlock();
    const inner = emit(body, aten.size, []);
    const after = emit(graph.block, aten.slice, []);

    expect(Array.from(walkBlock(graph.block))).toEqual([inner, loop, after]);
  });
});

describe("rewriteBlock", () => {
  it("counts the visits that report a rewrite", () => {
    const { graph } = buildNested();
    const rewrites = rewriteBlock(graph.block, (node) => node.kind === aten.size);

    expect(rewrites).toBe(5);
  });
});

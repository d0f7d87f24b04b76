import { describe, expect, it, vi } from "vitest";

import {
  aten,
  FloatType,
  IntType,
  IRGraph,
  lintGraph,
  listOf,
  matchListAddition,
  onnx,
  printGraph,
  replaceAddWithConcat,
  silentLogger,
  tensorOf,
} from "../src";
import { emit, findAll, intConstant, nestedBlock } from "./helpers/graphs";

function shapeSumGraph() {
  const graph = new IRGraph();
  const x = graph.addInput(tensorOf("f32", [2, 3, 4]), "x");
  const y = graph.addInput(tensorOf("f32", [1, 2, 3]), "y");
  const sx = emit(graph.block, aten.size, [x], [listOf(IntType)]).output();
  const sy = emit(graph.block, aten.size, [y], [listOf(IntType)]).output();
  const add = emit(graph.block, aten.add, [sx, sy], [listOf(IntType)]);
  const zeros = emit(graph.block, "aten::new_zeros", [x, add.output()]);
  graph.registerOutput(zeros.output());
  return { graph, add, zeros };
}

describe("replaceAddWithConcat", () => {
  it("turns int list addition into a Concat on axis 0", () => {
    const { graph, add, zeros } = shapeSumGraph();

    expect(replaceAddWithConcat(graph.block, silentLogger)).toBe(1);

    expect(add.alive).toBe(false);
    expect(zeros.input(1).node.kind).toBe(onnx.Concat);
    expect(printGraph(graph)).toBe(
      [
        "graph(%x : Float(2, 3, 4), %y : Float(1, 2, 3)):",
        "  %2 : int[] = aten::size(%x)",
        "  %3 : int[] = aten::size(%y)",
        "  %6 : Long() = onnx::Concat[axis=0](%2, %3)",
        "  %5 : Tensor = aten::new_zeros(%x, %6)",
        "  return (%5)",
      ].join("\n"),
    );
    lintGraph(graph);
  });

  it("logs the replaced value", () => {
    const { graph } = shapeSumGraph();
    const log = vi.fn();

    replaceAddWithConcat(graph.block, log);

    expect(log).toHaveBeenCalledWith("add-to-concat", "%4 -> %6");
  });

  it("rewrites additions in nested blocks", () => {
    const graph = new IRGraph();
    const block = nestedBlock(graph, 1);
    const x = graph.addInput(tensorOf("f32", [2]), "x");
    const size = emit(block, aten.size, [x], [listOf(IntType)]).output();
    const add = emit(block, aten.add, [size, size], [listOf(IntType)]);
    block.registerOutput(add.output());

    expect(replaceAddWithConcat(graph.block, silentLogger)).toBe(1);
    expect(block.outputs[0].node.kind).toBe(onnx.Concat);
    expect(block.outputs[0].node.inputs).toEqual([size, size]);
    lintGraph(graph);
  });

  it("leaves tensor additions alone", () => {
    const graph = new IRGraph();
    const a = graph.addInput(tensorOf("f32", [2]), "a");
    const b = graph.addInput(tensorOf("f32", [2]), "b");
    const alpha = intConstant(graph.block, 1);
    const add = emit(graph.block, aten.add, [a, b, alpha], [tensorOf("f32", [2])]);
    graph.registerOutput(add.output());

    expect(matchListAddition(add)).toBeUndefined();
    expect(replaceAddWithConcat(graph.block, silentLogger)).toBe(0);
    expect(findAll(graph, onnx.Concat)).toEqual([]);
  });

  it("requires int elements on the first operand", () => {
    const graph = new IRGraph();
    const floats = graph.addInput(listOf(FloatType), "f");
    const ints = graph.addInput(listOf(IntType), "i");
    const floatSum = emit(graph.block, aten.add, [floats, ints], [listOf(FloatType)]);
    const intSum = emit(graph.block, aten.add, [ints, floats], [listOf(IntType)]);

    expect(matchListAddition(floatSum)).toBeUndefined();
    expect(matchListAddition(intSum)).toEqual(IntType);
  });

  it("requires both operands to be lists", () => {
    const graph = new IRGraph();
    const ints = graph.addInput(listOf(IntType), "i");
    const scalar = graph.addInput(IntType, "n");
    const add = emit(graph.block, aten.add, [ints, scalar], [listOf(IntType)]);

    expect(matchListAddition(add)).toBeUndefined();
  });
});

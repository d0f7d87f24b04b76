import { describe, expect, it, vi } from "vitest";

import {
  aten,
  BoolType,
  type DType,
  IRGraph,
  type IRType,
  type IRValue,
  lintGraph,
  listOf,
  matchMaskedIndexPut,
  optionalOf,
  prim,
  printGraph,
  replaceIndexPutWithMasked,
  silentLogger,
  tensorOf,
} from "../src";
import { emit, findAll } from "./helpers/graphs";

function indexList(graph: IRGraph, indices: IRValue[]): IRValue {
  return emit(graph.block, prim.ListConstruct, indices, [listOf(optionalOf(tensorOf()))]).output();
}

function maskedAssignGraph(valueType: IRType, maskDType: DType = "bool") {
  const graph = new IRGraph();
  const x = graph.addInput(tensorOf("f32", [2, 2, 2]), "x");
  const mask = graph.addInput(tensorOf(maskDType, [2, 2, 2]), "mask");
  const indices = indexList(graph, [mask]);
  const value = emit(graph.block, prim.Constant, [], [valueType]).setTensor("value", {
    dtype: "f32",
    shape: [],
    values: [1],
  });
  const accumulate = emit(graph.block, prim.Constant, [], [BoolType]).setInt("value", 0);
  const put = emit(
    graph.block,
    aten.index_put_,
    [x, indices, value.output(), accumulate.output()],
    [tensorOf("f32", [2, 2, 2])],
  );
  graph.registerOutput(put.output());
  return { graph, x, mask, put };
}

describe("replaceIndexPutWithMasked", () => {
  it("lowers a scalar assignment to masked_fill", () => {
    const { graph, put } = maskedAssignGraph(tensorOf("f32", []));

    expect(replaceIndexPutWithMasked(graph.block, silentLogger)).toBe(1);

    expect(put.alive).toBe(false);
    expect(printGraph(graph)).toBe(
      [
        "graph(%x : Float(2, 2, 2), %mask : Bool(2, 2, 2)):",
        "  %2 : Tensor?[] = prim::ListConstruct(%mask)",
        "  %3 : Float() = prim::Constant[value={1}]()",
        "  %4 : bool = prim::Constant[value=0]()",
        "  %6 : Float(2, 2, 2) = aten::masked_fill(%x, %mask, %3)",
        "  return (%6)",
      ].join("\n"),
    );
    lintGraph(graph);
  });

  it("lowers a tensor assignment to masked_scatter", () => {
    const { graph, x, mask } = maskedAssignGraph(tensorOf("f32", [4]));

    replaceIndexPutWithMasked(graph.block, silentLogger);

    const [scatter] = findAll(graph, aten.masked_scatter);
    expect(scatter.inputs.slice(0, 2)).toEqual([x, mask]);
    expect(graph.outputs).toEqual([scatter.output()]);
    expect(findAll(graph, aten.masked_fill)).toEqual([]);
  });

  it("keeps the assigned value's name", () => {
    const { graph, put } = maskedAssignGraph(tensorOf("f32", []));
    put.output().debugName = "y";

    replaceIndexPutWithMasked(graph.block, silentLogger);

    expect(graph.outputs[0].debugName).toBe("y");
  });

  it("logs the chosen lowering", () => {
    const { graph } = maskedAssignGraph(tensorOf("f32", []));
    const log = vi.fn();

    replaceIndexPutWithMasked(graph.block, log);

    expect(log).toHaveBeenCalledWith("index-put-to-masked", "%6 -> aten::masked_fill");
  });

  it("leaves integer index assignment alone", () => {
    const { graph, put } = maskedAssignGraph(tensorOf("f32", []), "i64");

    expect(matchMaskedIndexPut(put)).toBeUndefined();
    expect(replaceIndexPutWithMasked(graph.block, silentLogger)).toBe(0);
    expect(put.alive).toBe(true);
  });

  it("leaves assignments of unknown rank alone", () => {
    const { put } = maskedAssignGraph(tensorOf("f32"));

    expect(matchMaskedIndexPut(put)).toBeUndefined();
  });

  it("only matches an index list built in the graph", () => {
    const graph = new IRGraph();
    const x = graph.addInput(tensorOf("f32", [2]), "x");
    const indices = graph.addInput(listOf(optionalOf(tensorOf())), "indices");
    const value = graph.addInput(tensorOf("f32", []), "v");
    const put = emit(graph.block, aten.index_put_, [x, indices, value], [tensorOf("f32", [2])]);

    expect(matchMaskedIndexPut(put)).toBeUndefined();
  });

  it("only matches index_put_ with self, indices and values", () => {
    const graph = new IRGraph();
    const x = graph.addInput(tensorOf("f32", [2]), "x");
    const mask = graph.addInput(tensorOf("bool", [2]), "mask");
    const put = emit(graph.block, aten.index_put_, [x, indexList(graph, [mask])], [tensorOf("f32", [2])]);

    expect(matchMaskedIndexPut(put)).toBeUndefined();
  });

  it("takes the first index as the mask", () => {
    const graph = new IRGraph();
    const x = graph.addInput(tensorOf("f32", [2, 2]), "x");
    const mask = graph.addInput(tensorOf("bool", [2, 2]), "mask");
    const other = graph.addInput(tensorOf("i64", [2]), "other");
    const value = graph.addInput(tensorOf("f32", []), "v");
    const put = emit(
      graph.block,
      aten.index_put_,
      [x, indexList(graph, [mask, other]), value],
      [tensorOf("f32", [2, 2])],
    );

    expect(matchMaskedIndexPut(put)).toEqual({ kind: aten.masked_fill, mask });
  });
});

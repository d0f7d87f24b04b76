/**
 * Operator kinds.
 *
 * A kind is a qualified symbol `namespace::name`. `prim` holds structural
 * operators, `aten` the frontend's tensor library, `onnx` operators already in
 * the export format's own vocabulary. Only the kinds the passes dispatch on are
 * listed here; any other qualified string is a valid kind.
 */

export type Namespace = "prim" | "aten" | "onnx";

export type OpKind = `${Namespace}::${string}`;

export const prim = {
  Param: "prim::Param",
  Return: "prim::Return",
  Constant: "prim::Constant",
  ListConstruct: "prim::ListConstruct",
  ListUnpack: "prim::ListUnpack",
  If: "prim::If",
  Loop: "prim::Loop",
} as const satisfies Record<string, OpKind>;

export const aten = {
  add: "aten::add",
  size: "aten::size",
  slice: "aten::slice",
  split: "aten::split",
  split_with_sizes: "aten::split_with_sizes",
  unsafe_split: "aten::unsafe_split",
  unsafe_split_with_sizes: "aten::unsafe_split_with_sizes",
  unbind: "aten::unbind",
  unsafe_chunk: "aten::unsafe_chunk",
  where: "aten::where",
  index_put_: "aten::index_put_",
  masked_fill: "aten::masked_fill",
  masked_scatter: "aten::masked_scatter",
} as const satisfies Record<string, OpKind>;

export const onnx = {
  Concat: "onnx::Concat",
  Constant: "onnx::Constant",
  Gather: "onnx::Gather",
} as const satisfies Record<string, OpKind>;

export const attr = {
  axis: "axis",
  value: "value",
  outputs: "_outputs",
} as const;

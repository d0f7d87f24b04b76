import type { AttributeValue, IRBlock, IRGraph, IRNode, IRValue } from "./graph";
import { typeToString } from "./types";

/**
 * Textual form of a graph:
 *
 *   graph(%x : Float(2, 3)):
 *     %1 : int[] = aten::size(%x)
 *     %a : int, %b : int = prim::ListUnpack(%1)
 *     %4 : Tensor = onnx::Concat[axis=0](%1, %1)
 *     return (%4)
 *
 * Nested blocks are printed under their node as `blockN(<params>):` followed
 * by the block's nodes and a `-> (<results>)` line.
 */
export function printGraph(graph: IRGraph): string {
  const lines: string[] = [];
  lines.push(`graph(${graph.inputs.map(valueDecl).join(", ")}):`);
  printNodes(graph.block, 1, lines);
  lines.push(`  return (${graph.outputs.map(valueRef).join(", ")})`);
  return lines.join("\n");
}

export function printNode(node: IRNode): string {
  const lines: string[] = [];
  printNodeInto(node, 0, lines);
  return lines.join("\n");
}

export function valueRef(value: IRValue): string {
  return `%${value.debugName ?? value.id}`;
}

function valueDecl(value: IRValue): string {
  return `${valueRef(value)} : ${typeToString(value.type)}`;
}

function printNodes(block: IRBlock, depth: number, lines: string[]): void {
  for (const node of block.nodes()) {
    printNodeInto(node, depth, lines);
  }
}

function printNodeInto(node: IRNode, depth: number, lines: string[]): void {
  const indent = "  ".repeat(depth);
  const outputs = node.outputs.map(valueDecl).join(", ");
  const attributes = node
    .attributeEntries()
    .map(([name, value]) => `${name}=${formatAttribute(value)}`);
  const attributePart = attributes.length > 0 ? `[${attributes.join(", ")}]` : "";
  const head = outputs.length > 0 ? `${outputs} = ` : "";
  const args = node.inputs.map(valueRef).join(", ");
  lines.push(`${indent}${head}${node.kind}${attributePart}(${args})`);

  node.blocks.forEach((block, i) => {
    lines.push(`${indent}  block${i}(${block.inputs.map(valueDecl).join(", ")}):`);
    printNodes(block, depth + 2, lines);
    lines.push(`${indent}    -> (${block.outputs.map(valueRef).join(", ")})`);
  });
}

function formatAttribute(attribute: AttributeValue): string {
  switch (attribute.type) {
    case "int":
    case "float":
      return String(attribute.value);
    case "ints":
      return `[${attribute.value.join(", ")}]`;
    case "string":
      return JSON.stringify(attribute.value);
    case "tensor": {
      const { shape, values } = attribute.value;
      return shape.length === 0 ? `{${values[0]}}` : `[${values.join(", ")}]`;
    }
  }
}

/**
 * Mutable SSA graph.
 *
 * Values, nodes and blocks hold direct references to one another, and the
 * owning graph keeps an arena of the live ones keyed by id. Use lists are back
 * references maintained by the node input primitives and by
 * `IRValue.replaceAllUsesWith`; callers never edit them directly.
 *
 * Each block's node list is circular through its `prim::Return` node, which
 * acts as the list sentinel. Its `prim::Param` node defines the block inputs
 * and is not part of the list.
 */

import { internalAssert } from "../errors";
import { type OpKind, prim } from "./symbols";
import { cloneType, type DType, DynamicTensorType, type IRType } from "./types";

export type TensorLiteral = {
  dtype: DType;
  shape: number[];
  values: number[];
};

export type AttributeValue =
  | { type: "int"; value: number }
  | { type: "ints"; value: number[] }
  | { type: "float"; value: number }
  | { type: "string"; value: string }
  | { type: "tensor"; value: TensorLiteral };

export type Use = {
  user: IRNode;
  offset: number;
};

// ============================================================================
// Value
// ============================================================================

export class IRValue {
  readonly id: number;
  debugName: string | undefined;
  private _type: IRType;
  private _offset: number;
  private _alive = true;
  private readonly _uses: Use[] = [];

  constructor(
    readonly node: IRNode,
    offset: number,
    type: IRType,
  ) {
    this._offset = offset;
    this._type = type;
    this.id = node.graph._registerValue(this);
  }

  get type(): IRType {
    return this._type;
  }

  setType(type: IRType): this {
    this._type = type;
    return this;
  }

  /** Position of this value in its defining node's outputs. */
  get offset(): number {
    return this._offset;
  }

  get uses(): readonly Readonly<Use>[] {
    return this._uses;
  }

  get alive(): boolean {
    return this._alive;
  }

  hasUses(): boolean {
    return this._uses.length > 0;
  }

  copyMetadata(from: IRValue): this {
    this._type = cloneType(from.type);
    this.debugName = from.debugName;
    return this;
  }

  /**
   * Point every user of this value at `replacement`. Users keep their slot;
   * the use records move over in order.
   */
  replaceAllUsesWith(replacement: IRValue): void {
    internalAssert(replacement !== this, "value cannot replace itself");
    internalAssert(
      replacement.node.graph === this.node.graph,
      "replacement value belongs to another graph",
    );
    internalAssert(replacement.alive, "replacement value was destroyed");
    for (const use of this._uses) {
      use.user._setInputUnchecked(use.offset, replacement);
      replacement._uses.push(use);
    }
    this._uses.length = 0;
  }

  /** @internal */
  _addUse(use: Use): void {
    this._uses.push(use);
  }

  /** @internal */
  _removeUse(user: IRNode, offset: number): void {
    const index = this._uses.findIndex(
      (use) => use.user === user && use.offset === offset,
    );
    internalAssert(
      index >= 0,
      () => `value %${this.id} has no use at ${user.kind} input ${offset}`,
    );
    this._uses.splice(index, 1);
  }

  /** @internal */
  _shiftUse(user: IRNode, from: number, to: number): void {
    const use = this._uses.find((u) => u.user === user && u.offset === from);
    internalAssert(
      use !== undefined,
      () => `value %${this.id} has no use at ${user.kind} input ${from}`,
    );
    use.offset = to;
  }

  /** @internal */
  _setOffset(offset: number): void {
    this._offset = offset;
  }

  /** @internal */
  _release(): void {
    internalAssert(
      this._uses.length === 0,
      () => `value %${this.id} released with ${this._uses.length} uses`,
    );
    this._alive = false;
    this.node.graph._releaseValue(this);
  }
}

// ============================================================================
// Node
// ============================================================================

export class IRNode {
  readonly id: number;
  private readonly _inputs: IRValue[] = [];
  private readonly _outputs: IRValue[] = [];
  private readonly _blocks: IRBlock[] = [];
  private readonly _attributes = new Map<string, AttributeValue>();
  private _owningBlock: IRBlock | null = null;
  private _prev: IRNode | null = null;
  private _next: IRNode | null = null;
  private _alive = true;

  constructor(
    readonly graph: IRGraph,
    readonly kind: OpKind,
  ) {
    this.id = graph._registerNode(this);
  }

  get inputs(): readonly IRValue[] {
    return this._inputs;
  }

  get outputs(): readonly IRValue[] {
    return this._outputs;
  }

  get blocks(): readonly IRBlock[] {
    return this._blocks;
  }

  get owningBlock(): IRBlock | null {
    return this._owningBlock;
  }

  get prev(): IRNode | null {
    return this._prev;
  }

  get next(): IRNode | null {
    return this._next;
  }

  get alive(): boolean {
    return this._alive;
  }

  /** True while the node sits in a block's node list. */
  get inBlockList(): boolean {
    return this._next !== null;
  }

  /** `input(i)`, or with no index the sole input. */
  input(i?: number): IRValue {
    if (i === undefined) {
      internalAssert(
        this._inputs.length === 1,
        () => `${this.kind} expected exactly one input, found ${this._inputs.length}`,
      );
      return this._inputs[0];
    }
    const value = this._inputs[i];
    internalAssert(
      value !== undefined,
      () => `${this.kind} has no input ${i} (has ${this._inputs.length})`,
    );
    return value;
  }

  /** `output(i)`, or with no index the sole output. */
  output(i?: number): IRValue {
    if (i === undefined) {
      internalAssert(
        this._outputs.length === 1,
        () => `${this.kind} expected exactly one output, found ${this._outputs.length}`,
      );
      return this._outputs[0];
    }
    const value = this._outputs[i];
    internalAssert(
      value !== undefined,
      () => `${this.kind} has no output ${i} (has ${this._outputs.length})`,
    );
    return value;
  }

  hasUses(): boolean {
    return this._outputs.some((output) => output.hasUses());
  }

  // --------------------------------------------------------------------------
  // Inputs
  // --------------------------------------------------------------------------

  addInput(value: IRValue): IRValue {
    this.assertAlive();
    internalAssert(value.alive, () => `%${value.id} was destroyed`);
    internalAssert(
      value.node.graph === this.graph,
      "input value belongs to another graph",
    );
    const offset = this._inputs.length;
    this._inputs.push(value);
    value._addUse({ user: this, offset });
    return value;
  }

  /** Swap the value at slot `i`, returning the previous one. */
  replaceInput(i: number, value: IRValue): IRValue {
    const old = this.input(i);
    internalAssert(value.alive, () => `%${value.id} was destroyed`);
    old._removeUse(this, i);
    this._inputs[i] = value;
    value._addUse({ user: this, offset: i });
    return old;
  }

  removeInput(i: number): void {
    const value = this.input(i);
    value._removeUse(this, i);
    for (let j = i + 1; j < this._inputs.length; j++) {
      this._inputs[j]._shiftUse(this, j, j - 1);
    }
    this._inputs.splice(i, 1);
  }

  removeAllInputs(): void {
    for (let i = this._inputs.length - 1; i >= 0; i--) {
      this.removeInput(i);
    }
  }

  /** @internal Use-list bookkeeping is the caller's job. */
  _setInputUnchecked(offset: number, value: IRValue): void {
    this._inputs[offset] = value;
  }

  // --------------------------------------------------------------------------
  // Outputs
  // --------------------------------------------------------------------------

  addOutput(type: IRType = DynamicTensorType): IRValue {
    this.assertAlive();
    const value = new IRValue(this, this._outputs.length, cloneType(type));
    this._outputs.push(value);
    return value;
  }

  eraseOutput(i: number): void {
    const value = this.output(i);
    internalAssert(
      !value.hasUses(),
      () => `cannot erase output ${i} of ${this.kind}: ${value.uses.length} uses remain`,
    );
    this._outputs.splice(i, 1);
    for (let j = i; j < this._outputs.length; j++) {
      this._outputs[j]._setOffset(j);
    }
    value._release();
  }

  /** Redirect the uses of each output to the matching output of `other`. */
  replaceAllUsesWith(other: IRNode): void {
    internalAssert(
      this._outputs.length === other._outputs.length,
      () =>
        `${this.kind} has ${this._outputs.length} outputs but ${other.kind} has ${other._outputs.length}`,
    );
    for (let i = 0; i < this._outputs.length; i++) {
      this._outputs[i].replaceAllUsesWith(other._outputs[i]);
    }
  }

  // --------------------------------------------------------------------------
  // Blocks and attributes
  // --------------------------------------------------------------------------

  addBlock(): IRBlock {
    this.assertAlive();
    const block = new IRBlock(this.graph, this);
    this._blocks.push(block);
    return block;
  }

  setAttribute(name: string, value: AttributeValue): this {
    this._attributes.set(name, value);
    return this;
  }

  setInt(name: string, value: number): this {
    return this.setAttribute(name, { type: "int", value });
  }

  setInts(name: string, value: number[]): this {
    return this.setAttribute(name, { type: "ints", value: value.slice() });
  }

  setString(name: string, value: string): this {
    return this.setAttribute(name, { type: "string", value });
  }

  setTensor(name: string, value: TensorLiteral): this {
    return this.setAttribute(name, {
      type: "tensor",
      value: {
        dtype: value.dtype,
        shape: value.shape.slice(),
        values: value.values.slice(),
      },
    });
  }

  getInt(name: string): number | undefined {
    const attribute = this._attributes.get(name);
    return attribute?.type === "int" ? attribute.value : undefined;
  }

  getTensor(name: string): TensorLiteral | undefined {
    const attribute = this._attributes.get(name);
    return attribute?.type === "tensor" ? attribute.value : undefined;
  }

  hasAttribute(name: string): boolean {
    return this._attributes.has(name);
  }

  /** Attributes in the order they were first set. */
  attributeEntries(): [string, AttributeValue][] {
    return Array.from(this._attributes.entries());
  }

  // --------------------------------------------------------------------------
  // Placement
  // --------------------------------------------------------------------------

  insertBefore(anchor: IRNode): this {
    this.assertAlive();
    internalAssert(
      !this.inBlockList && this._owningBlock === null,
      () => `${this.kind} is already in a block`,
    );
    const prev = anchor._prev;
    internalAssert(
      anchor.inBlockList && prev !== null,
      () => `anchor ${anchor.kind} is not in a block`,
    );
    this._prev = prev;
    this._next = anchor;
    prev._next = this;
    anchor._prev = this;
    this._owningBlock = anchor._owningBlock;
    return this;
  }

  insertAfter(anchor: IRNode): this {
    const next = anchor._next;
    internalAssert(next !== null, () => `anchor ${anchor.kind} is not in a block`);
    return this.insertBefore(next);
  }

  /**
   * Remove the node from the graph. Every output must already be unused;
   * inputs are dropped and nested blocks destroyed with it.
   */
  destroy(): void {
    internalAssert(
      this.kind !== prim.Param && this.kind !== prim.Return,
      () => `${this.kind} is owned by its block and cannot be destroyed directly`,
    );
    this._teardown();
  }

  /** @internal */
  _teardown(): void {
    this.assertAlive();
    for (const output of this._outputs) {
      internalAssert(
        !output.hasUses(),
        () => `cannot destroy ${this.kind}: output %${output.id} still has ${output.uses.length} uses`,
      );
    }
    this.removeAllInputs();
    for (const block of this._blocks) {
      block._destroy();
    }
    this._blocks.length = 0;
    this.unlink();
    for (const output of this._outputs) {
      output._release();
    }
    this._outputs.length = 0;
    this._owningBlock = null;
    this._alive = false;
    this.graph._releaseNode(this);
  }

  /** @internal */
  _adopt(block: IRBlock): void {
    this._owningBlock = block;
  }

  /** @internal Make this node the sentinel of `block`'s empty node list. */
  _makeSentinel(block: IRBlock): void {
    this._owningBlock = block;
    this._prev = this;
    this._next = this;
  }

  private unlink(): void {
    const prev = this._prev;
    const next = this._next;
    if (prev !== null && next !== null && prev !== this) {
      prev._next = next;
      next._prev = prev;
    }
    this._prev = null;
    this._next = null;
  }

  private assertAlive(): void {
    internalAssert(this._alive, () => `${this.kind} #${this.id} was destroyed`);
  }
}

// ============================================================================
// Block
// ============================================================================

export class IRBlock {
  readonly paramNode: IRNode;
  readonly returnNode: IRNode;

  constructor(
    readonly graph: IRGraph,
    readonly owningNode: IRNode | null,
  ) {
    this.paramNode = new IRNode(graph, prim.Param);
    this.paramNode._adopt(this);
    this.returnNode = new IRNode(graph, prim.Return);
    this.returnNode._makeSentinel(this);
  }

  get inputs(): readonly IRValue[] {
    return this.paramNode.outputs;
  }

  get outputs(): readonly IRValue[] {
    return this.returnNode.inputs;
  }

  addInput(type: IRType = DynamicTensorType, debugName?: string): IRValue {
    const value = this.paramNode.addOutput(type);
    value.debugName = debugName;
    return value;
  }

  /** Add `value` to the block results, returning its position. */
  registerOutput(value: IRValue): number {
    this.returnNode.addInput(value);
    return this.returnNode.inputs.length - 1;
  }

  /** Snapshot of the node list in order. */
  nodes(): IRNode[] {
    const nodes: IRNode[] = [];
    let cursor = this.returnNode.next;
    while (cursor !== null && cursor !== this.returnNode) {
      nodes.push(cursor);
      cursor = cursor.next;
    }
    return nodes;
  }

  appendNode(node: IRNode): IRNode {
    return node.insertBefore(this.returnNode);
  }

  prependNode(node: IRNode): IRNode {
    return node.insertAfter(this.returnNode);
  }

  /** @internal */
  _destroy(): void {
    this.returnNode.removeAllInputs();
    const nodes = this.nodes();
    for (let i = nodes.length - 1; i >= 0; i--) {
      nodes[i].destroy();
    }
    this.returnNode._teardown();
    this.paramNode._teardown();
  }
}

// ============================================================================
// Graph
// ============================================================================

export class IRGraph {
  readonly block: IRBlock;
  private nextNodeId = 0;
  private nextValueId = 0;
  private readonly nodeArena = new Map<number, IRNode>();
  private readonly valueArena = new Map<number, IRValue>();

  constructor() {
    this.block = new IRBlock(this, null);
  }

  get inputs(): readonly IRValue[] {
    return this.block.inputs;
  }

  get outputs(): readonly IRValue[] {
    return this.block.outputs;
  }

  addInput(type: IRType = DynamicTensorType, debugName?: string): IRValue {
    return this.block.addInput(type, debugName);
  }

  registerOutput(value: IRValue): number {
    return this.block.registerOutput(value);
  }

  /** Create a detached node; place it with `insertBefore` / `appendNode`. */
  create(kind: OpKind, inputs: readonly IRValue[] = [], numOutputs = 1): IRNode {
    const node = new IRNode(this, kind);
    for (const input of inputs) {
      node.addInput(input);
    }
    for (let i = 0; i < numOutputs; i++) {
      node.addOutput();
    }
    return node;
  }

  appendNode(node: IRNode): IRNode {
    return this.block.appendNode(node);
  }

  /** Every live node, structural `prim::Param` / `prim::Return` included. */
  liveNodes(): IRNode[] {
    return Array.from(this.nodeArena.values());
  }

  get nodeCount(): number {
    return this.nodeArena.size;
  }

  nodeById(id: number): IRNode | undefined {
    return this.nodeArena.get(id);
  }

  valueById(id: number): IRValue | undefined {
    return this.valueArena.get(id);
  }

  /** @internal */
  _registerNode(node: IRNode): number {
    const id = this.nextNodeId++;
    this.nodeArena.set(id, node);
    return id;
  }

  /** @internal */
  _registerValue(value: IRValue): number {
    const id = this.nextValueId++;
    this.valueArena.set(id, value);
    return id;
  }

  /** @internal */
  _releaseNode(node: IRNode): void {
    this.nodeArena.delete(node.id);
  }

  /** @internal */
  _releaseValue(value: IRValue): void {
    this.valueArena.delete(value.id);
  }
}

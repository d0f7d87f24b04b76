export type DType = "bool" | "u8" | "i8" | "i32" | "i64" | "f16" | "f32" | "f64";

export type ScalarKind = "int" | "float" | "bool" | "none" | "str" | "device";

/**
 * Static type of an IR value.
 *
 * Tensor facts are optional: `dtype` is absent when the element type was not
 * inferred, `sizes` is absent when even the rank is unknown. A `null` entry in
 * `sizes` is a dimension whose extent is symbolic.
 */
export type IRType =
  | { kind: ScalarKind }
  | { kind: "list"; elem: IRType }
  | { kind: "optional"; elem: IRType }
  | { kind: "tensor"; dtype?: DType; sizes?: (number | null)[] };

export type TensorType = Extract<IRType, { kind: "tensor" }>;

// ============================================================================
// Constructors
// ============================================================================

export const IntType: IRType = { kind: "int" };
export const FloatType: IRType = { kind: "float" };
export const BoolType: IRType = { kind: "bool" };
export const NoneType: IRType = { kind: "none" };

export function listOf(elem: IRType): IRType {
  return { kind: "list", elem };
}

export function optionalOf(elem: IRType): IRType {
  return { kind: "optional", elem };
}

export function tensorOf(dtype?: DType, sizes?: (number | null)[]): IRType {
  const type: TensorType = { kind: "tensor" };
  if (dtype !== undefined) type.dtype = dtype;
  if (sizes !== undefined) type.sizes = sizes.slice();
  return type;
}

/** The unrefined `Tensor` type: neither dtype nor rank known. */
export const DynamicTensorType: IRType = { kind: "tensor" };

const NUMBER_DTYPES: Partial<Record<ScalarKind, DType>> = {
  int: "i64",
  float: "f64",
  bool: "bool",
};

/**
 * Rank-0 tensor type holding a number of the given scalar type.
 * Returns undefined for types that are not numbers.
 */
export function tensorFromNumberType(type: IRType): IRType | undefined {
  if (type.kind === "list" || type.kind === "optional" || type.kind === "tensor") {
    return undefined;
  }
  const dtype = NUMBER_DTYPES[type.kind];
  return dtype === undefined ? undefined : tensorOf(dtype, []);
}

// ============================================================================
// Queries (undefined = unknown)
// ============================================================================

export function listElementType(type: IRType): IRType | undefined {
  return type.kind === "list" ? type.elem : undefined;
}

export function tensorRank(type: IRType): number | undefined {
  return type.kind === "tensor" ? type.sizes?.length : undefined;
}

export function tensorDType(type: IRType): DType | undefined {
  return type.kind === "tensor" ? type.dtype : undefined;
}

export function isIntegral(type: IRType): boolean {
  return type.kind === "int";
}

/** True for `int[]`. */
export function isIntList(type: IRType): boolean {
  const elem = listElementType(type);
  return elem !== undefined && isIntegral(elem);
}

export function cloneType(type: IRType): IRType {
  switch (type.kind) {
    case "list":
      return listOf(cloneType(type.elem));
    case "optional":
      return optionalOf(cloneType(type.elem));
    case "tensor":
      return tensorOf(type.dtype, type.sizes);
    default:
      return { kind: type.kind };
  }
}

const DTYPE_NAMES: Record<DType, string> = {
  bool: "Bool",
  u8: "Byte",
  i8: "Char",
  i32: "Int",
  i64: "Long",
  f16: "Half",
  f32: "Float",
  f64: "Double",
};

/**
 * Render a type the way graph dumps show it: `int[]`, `Tensor?[]`,
 * `Float(2, 3)`, `Long()`, `Bool(*, 4)`, `Tensor`.
 */
export function typeToString(type: IRType): string {
  switch (type.kind) {
    case "list":
      return `${typeToString(type.elem)}[]`;
    case "optional":
      return `${typeToString(type.elem)}?`;
    case "tensor": {
      if (type.dtype === undefined && type.sizes === undefined) {
        return "Tensor";
      }
      const head = type.dtype === undefined ? "Tensor" : DTYPE_NAMES[type.dtype];
      if (type.sizes === undefined) {
        return head;
      }
      const dims = type.sizes.map((d) => (d === null ? "*" : String(d)));
      return `${head}(${dims.join(", ")})`;
    }
    case "none":
      return "NoneType";
    default:
      return type.kind;
  }
}

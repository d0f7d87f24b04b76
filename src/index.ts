export { GraphLintError, InternalAssertError, internalAssert } from "./errors";
export type { AttributeValue, TensorLiteral, Use } from "./ir/graph";
export { IRBlock, IRGraph, IRNode, IRValue } from "./ir/graph";
export { lintGraph } from "./ir/lint";
export { printGraph, printNode, valueRef } from "./ir/printer";
export type { Namespace, OpKind } from "./ir/symbols";
export { aten, attr, onnx, prim } from "./ir/symbols";
export type { DType, IRType, ScalarKind, TensorType } from "./ir/types";
export {
  BoolType,
  cloneType,
  DynamicTensorType,
  FloatType,
  IntType,
  isIntList,
  isIntegral,
  listElementType,
  listOf,
  NoneType,
  optionalOf,
  tensorDType,
  tensorFromNumberType,
  tensorOf,
  tensorRank,
  typeToString,
} from "./ir/types";
export { rewriteBlock, walkBlock } from "./ir/walk";
export {
  ADD_TO_CONCAT,
  matchListAddition,
  replaceAddWithConcat,
  replaceAddWithConcatNode,
} from "./passes/add-to-concat";
export {
  FUSE_LIST_UNPACK,
  findFusibleListUnpack,
  fuseNodeWithListUnpack,
  fuseWithListUnpack,
  VARIADIC_OUTPUT_OPS,
} from "./passes/fuse-list-unpack";
export type { MaskedAssignment } from "./passes/index-put-to-masked";
export {
  INDEX_PUT_TO_MASKED,
  lowerMaskedIndexPut,
  matchMaskedIndexPut,
  replaceIndexPutWithMasked,
} from "./passes/index-put-to-masked";
export type { PassLogger } from "./passes/pass-log";
export { consoleLogger, silentLogger } from "./passes/pass-log";
export type { PreprocessOptions, PreprocessPass } from "./passes/preprocess";
export { PREPROCESS_PASSES, preprocessForExport } from "./passes/preprocess";
export {
  fuseListAndListUnpack,
  gatherUnpackedElements,
  matchComputedIntListUnpack,
  UNPACK_TO_GATHER,
} from "./passes/unpack-to-gather";

/**
 * Imperative instruction families with dry, direct and C-generating
 * interpreters.
 */

// Scalar types
export {
  SCALAR_TYPES,
  ALL_SCALAR_TYPES,
  isScalarType,
  scalarInfo,
  isIntegral,
  isFormattable,
  formatSpecifier,
  scanSpecifier,
  toNumber,
  toBool,
  coerceValue,
  zeroValue,
  parseScalar,
} from "./types";
export type {
  ScalarType,
  SignedIntType,
  UnsignedIntType,
  FloatType,
  IntegralType,
  FormattableType,
  HostValue,
  ScalarKind,
  ScalarInfo,
} from "./types";

// Errors
export {
  ImperativeError,
  UnsupportedOperationError,
  UninitializedReadError,
  AssertionFailureError,
  ParseFailureError,
  RepresentationError,
  UnsupportedTypeError,
  ExpressionError,
  FormatError,
  IndexError,
  CodegenError,
  NamingMismatchError,
} from "./errors";
export type { Backend } from "./errors";

// Names, logging, configuration
export { NameSupply } from "./names";
export { getLogger } from "./logger";
export { loggingConfig, resolveLogLevel, isLoggingSilent } from "./config";
export type { LogService, LoggingConfig } from "./config";

// Expression language
export {
  lit,
  varRef,
  bool,
  int,
  int32,
  int64,
  word32,
  float,
  double,
  add,
  sub,
  mul,
  div,
  mod,
  bitAnd,
  bitOr,
  bitXor,
  shl,
  shr,
  eq,
  neq,
  lt,
  lte,
  gt,
  gte,
  and,
  or,
  neg,
  not,
  complement,
  cond,
  cast,
  exprToString,
} from "./exp/expr";
export type {
  Expr,
  LitExpr,
  VarExpr,
  BinaryExpr,
  UnaryExpr,
  CondExpr,
  CastExpr,
  ArithOp,
  CompareOp,
  LogicOp,
  BitOp,
  BinaryOp,
  UnaryOp,
} from "./exp/expr";
export { evalExpr } from "./exp/evaluate";
export { compileExpr, exprHeaders } from "./exp/compile";
export { exprLang, restrictExprLang } from "./exp/lang";
export type { ExpLang } from "./exp/lang";

// Programs
export { dispatch, isFamily, project, pure, skip, step, bind, map, seq, sequence, forEach } from "./program/program";
export type {
  InstrFamilies,
  FamilyName,
  Instr,
  FamilyInstr,
  FamilyHandlers,
  Program,
  Pure,
  Step,
  Bind,
} from "./program/program";
export { mapSubPrograms, mapControlSubPrograms, subProgramCount } from "./program/traverse";
export type { SubProgramTransformer } from "./program/traverse";

// Instruction families
export { symbolicRef, newRef, initRef, getRef, setRef, modifyRef, unsafeFreezeRef } from "./instructions/ref";
export type { Ref, SymbolicRef, LiveRef, RefCmd, NewRef, InitRef, GetRef, SetRef, UnsafeFreezeRef } from "./instructions/ref";
export { symbolicArr, newArr, newArr_, initArr, getArr, setArr, copyArr } from "./instructions/arr";
export type { Arr, SymbolicArr, LiveArr, ArrCmd, NewArr, NewArrUnsized, InitArr, GetArr, SetArr, CopyArr } from "./instructions/arr";
export {
  incl,
  excl,
  borderVal,
  borderIncl,
  ixRange,
  loopComparison,
  loopContinues,
  iff,
  when,
  whileLoop,
  forLoop,
  breakLoop,
  assert,
} from "./instructions/control";
export type { Border, IxRange, LoopComparison, ControlCmd, If, While, For, Break, Assert } from "./instructions/control";
export {
  symbolicHandle,
  stdin,
  stdout,
  isStandardHandle,
  C_MODES,
  printfArg,
  fopen,
  fclose,
  feof,
  fprintf,
  printf,
  fput,
  fget,
} from "./instructions/file";
export type {
  Handle,
  SymbolicHandle,
  LiveHandle,
  IOMode,
  PrintfArg,
  FileCmd,
  FOpen,
  FClose,
  FEof,
  FPrintf,
  FGet,
} from "./instructions/file";
export { objectEquals, compareObjects, newObject, initObject } from "./instructions/object";
export type { ObjectHandle, ObjectCmd, NewObject, InitObject } from "./instructions/object";
export {
  valArg,
  refArg,
  arrArg,
  objArg,
  handleArg,
  strArg,
  addr,
  deref,
  addInclude,
  addDefinition,
  addExternFun,
  addExternProc,
  callFun,
  callProc,
} from "./instructions/call";
export type {
  FunArg,
  ValueArg,
  RefArg,
  ArrArg,
  ObjectArg,
  HandleArg,
  StringArg,
  AddrArg,
  DerefArg,
  CallCmd,
  AddInclude,
  AddDefinition,
  AddExternFun,
  AddExternProc,
  CallFun,
  CallProc,
} from "./instructions/call";

// Interpreters
export { Interpreter } from "./interp/interpreter";
export { runDry, DryInterpreter } from "./interp/dry";
export type { DryRunOptions, DryRunResult } from "./interp/dry";
export { runDirect, DirectInterpreter } from "./interp/direct";
export type { DirectOptions } from "./interp/direct";
export { FdSource, StringSource, FdSink, StringSink, readWord } from "./interp/io";
export type { ByteSource, OutputSink } from "./interp/io";
export { formatPrintf } from "./interp/printf";
export type { FormatArg } from "./interp/printf";

// Code generation
export * from "./codegen";

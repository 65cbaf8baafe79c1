export {
  BINOPS,
  BINOP_SYMBOLS,
  BUILTINS,
  isBuiltin,
  precedenceOf,
  type BinOp,
  type Builtin,
} from './builtins.js';
export { mapEmbed, squashEmbed, traverseEmbed, traverseResolve } from './embed.js';
export { exprEquals, plainEquals } from './equality.js';
export {
  absurd,
  v,
  type Const,
  type ExprF,
  type FieldMap,
  type InterpolatedText,
  type Label,
  type V,
} from './expr.js';
export {
  renderImport,
  renderLocation,
  type FilePrefix,
  type Import,
  type ImportHash,
  type ImportLocation,
  type ImportMode,
} from './import.js';
export {
  rebuildTree,
  type Alternative,
  type RebuildVisitor,
} from './rebuild.js';
export { overBinder, shift, shiftVar, subst } from './shift.js';
export {
  SubExpr,
  unspanned,
  type Expr,
  type SubExprVisitor,
} from './sub-expr.js';
export { fromChunks, plainText, toChunks, type TextChunk } from './text.js';
export { mapExprF, type ExprFVisitor } from './visitor.js';

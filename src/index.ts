export { ParseError, parseExpr, tokenize } from './syntax';
export {
  armToValue,
  attributeToString,
  attrsToValue,
  binOpSymbol,
  blockToString,
  exprToValue,
  exprsToValues,
  fieldValueToValue,
  labelToValue,
  litToValue,
  macroToString,
  memberToValue,
  pathToString,
  patToString,
  rangeLimitsToValue,
  renderExpr,
  renderSlice,
  renderTokens,
  typeToString,
  unOpSymbol
} from './converter';
export { EmitError, assertCanonical, emitEstree, emitJson, toJson } from './emitter';
export type { EmitOptions } from './emitter';
export type * from './types';

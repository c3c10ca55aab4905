export { emitDeclaration } from './emitDeclaration.js';
export { emitFunction, errorRecordName, optionalRecordName } from './emitFunction.js';
export { emitRecord, freeSymbol, PYCLASS_ATTRIBUTE } from './emitRecord.js';
export { emitMethods, PYMETHODS_ATTRIBUTE } from './emitMethods.js';
export { SymbolRegistry } from './symbolRegistry.js';
export { renderType } from './rustText.js';
export type * from './emitTypes.js';

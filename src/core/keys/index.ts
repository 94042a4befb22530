export type { ParseResult, Converter, Descriptor, DescriptorOptions } from './descriptor.js';
export { createDescriptor, stringDescriptor, intDescriptor, boolDescriptor, listDescriptor } from './descriptor.js';

export type { Doc, DocOptions } from './doc.js';
export { createDoc, docFlags, toOption, emitDoc } from './doc.js';

export type { Key, AnyKey } from './key.js';
export { keyName, keyStage, isRuntime, isConfigure, sameKey, compareKeys, matchesStage } from './key.js';
export { KeySet } from './key-set.js';
export type { CreateKeyOptions, CreateRawKeyOptions } from './key-registry.js';
export { KeyRegistry } from './key-registry.js';

export type { ValueExpr, ConstExpr, KeyRefExpr, ApplyExpr, ApplyVisitor } from './value.js';
export { pure, value, app, ap, map, lift2 } from './value.js';
export type { EvalOrigin } from './interpret.js';
export { deps, peek, evalValue } from './interpret.js';

export type { BindingSource } from './eval-context.js';
export { EvalContext } from './eval-context.js';

export type { KeyReadResult, KeyArgument, KeyBinding, TermResult, KeyTerm } from './cli-term.js';
export { termKey, term, applyTermResult } from './cli-term.js';

export { serializeKey, describeKey, emitKey } from './key-output.js';

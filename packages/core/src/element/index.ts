export type { ElementType, ElementOf, Storage, ArrayFactory } from './types';
export {
  numberType,
  stringType,
  booleanType,
  bigintType,
  elementType,
  nullable,
  builtinTypeOf,
} from './constants';
export { denseArrayFactory, allocFilled, rectangularDims } from './factory';

export type { LazySequence } from './lazy-sequence';
export { IndexedSequence, sequenceOf, emptySequence } from './lazy-sequence';

export type { IEntityReference, ReferenceCollection } from './IEntityReference.js';

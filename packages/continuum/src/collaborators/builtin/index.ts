/**
 * Built-in collaborators for the kinds that need no external model
 */

import type { CollaboratorSet } from '../registry.js';
import { ExemplarGenerator, SchemaDescriber } from './data.js';
import { OutlineDescriber, SkeletonGenerator } from './library.js';

export * from './data.js';
export * from './library.js';
export * from './shape.js';

export function createBuiltinCollaborators(): Required<Pick<CollaboratorSet, 'describers' | 'generators'>> {
  return {
    describers: { data: new SchemaDescriber(), library: new OutlineDescriber() },
    generators: { data: new ExemplarGenerator(), library: new SkeletonGenerator() },
  };
}

import type { AttributeSet } from '../../attributes/attributeSet.js';
import type { FunctionalDependency } from '../../dependencies/functionalDependency.js';
import type { AttributeNameAdapter } from '../../relations/adapter.js';

/** Everything a normal-form check needs to know about one relation. */
export interface RelationContext {
  readonly name: string;
  readonly adapter: AttributeNameAdapter;
  readonly dependencies: readonly FunctionalDependency[];
  readonly keys: readonly AttributeSet[];
}

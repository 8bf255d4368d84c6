/**
 * Property Serializer
 *
 * Turns an item's properties into a Cypher map literal of parameter placeholders
 * plus the matching parameter bindings.
 *
 * Neo4j does not store a property whose value is null, so `CREATE (n {note: null})`
 * leaves no `note` key behind and `MATCH (n {note: null})` never finds it again.
 * Null and undefined values are therefore dropped before anything is emitted, and
 * create and match statements go through this same function.
 */

import { GraphProperties, PropertyValue, QueryParams } from '../../types/GraphTypes';
import { IDENTIFIER_TOKEN } from '../../types/GraphDescriptionSchema';
import { InvalidGraphItemError } from '../../types/UploadErrors';

export interface SerializedProperties {
  /** `{name: $n_name, age: $n_age}` */
  text: string;
  /** `{ n_name: ..., n_age: ... }` */
  params: QueryParams;
}

export function assertIdentifier(value: string, what: string): void {
  if (!IDENTIFIER_TOKEN.test(value)) {
    throw new InvalidGraphItemError(`Invalid ${what} '${value}': expected letters, digits and underscores`);
  }
}

export function withoutNulls(properties: GraphProperties): Array<[string, Exclude<PropertyValue, null>]> {
  const entries: Array<[string, Exclude<PropertyValue, null>]> = [];
  for (const [key, value] of Object.entries(properties)) {
    if (value !== null && value !== undefined) {
      entries.push([key, value]);
    }
  }
  return entries;
}

export function serializeProperties(properties: GraphProperties, role: string): SerializedProperties {
  assertIdentifier(role, 'role identifier');

  const fragments: string[] = [];
  const params: QueryParams = {};

  for (const [key, value] of withoutNulls(properties)) {
    assertIdentifier(key, 'property key');
    const paramName = `${role}_${key}`;
    fragments.push(`${key}: $${paramName}`);
    params[paramName] = value;
  }

  return { text: `{${fragments.join(', ')}}`, params };
}

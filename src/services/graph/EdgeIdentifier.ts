/**
 * Edge identifier grammar
 *
 * An edge names its own endpoints: `<leftId>-><rightId>` or `<leftId><-<rightId>`.
 * Node ids are letters, digits, `.`, `,`, `-`, `_` and spaces.
 */

import { EdgeDirection, EdgeEndpoints } from '../../types/GraphTypes';
import { EdgeIdParseError } from '../../types/UploadErrors';

export const NODE_ID_PATTERN = '[a-zA-Z0-9.,\\-_ ]+';

export const EDGE_ID_PATTERN = `(${NODE_ID_PATTERN})(<-|->)(${NODE_ID_PATTERN})`;

const EDGE_ID_REGEX = new RegExp(`^${EDGE_ID_PATTERN}$`);

export type EdgeIdParseResult =
  | { success: true; data: EdgeEndpoints }
  | { success: false; error: EdgeIdParseError };

export function safeParseEdgeId(edgeId: string): EdgeIdParseResult {
  const match = EDGE_ID_REGEX.exec(edgeId);
  if (!match) {
    return { success: false, error: new EdgeIdParseError(edgeId, EDGE_ID_PATTERN) };
  }

  const [, leftId, token, rightId] = match;
  return {
    success: true,
    data: {
      leftId,
      direction: token === '->' ? EdgeDirection.RIGHT : EdgeDirection.LEFT,
      rightId,
    },
  };
}

/**
 * @throws EdgeIdParseError when the id does not match the grammar
 */
export function parseEdgeId(edgeId: string): EdgeEndpoints {
  const result = safeParseEdgeId(edgeId);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

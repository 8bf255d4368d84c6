import {
  EDGE_ID_PATTERN,
  parseEdgeId,
  safeParseEdgeId,
} from '../../../services/graph/EdgeIdentifier';
import { EdgeDirection } from '../../../types/GraphTypes';
import { EdgeIdParseError } from '../../../types/UploadErrors';

describe('EdgeIdentifier', () => {
  describe('parseEdgeId', () => {
    it('parses -> as RIGHT', () => {
      expect(parseEdgeId('A->B')).toEqual({ leftId: 'A', direction: EdgeDirection.RIGHT, rightId: 'B' });
    });

    it('parses <- as LEFT', () => {
      expect(parseEdgeId('A<-B')).toEqual({ leftId: 'A', direction: EdgeDirection.LEFT, rightId: 'B' });
    });

    it('accepts every node id character class', () => {
      expect(parseEdgeId('node 1.a,b->node_2')).toEqual({
        leftId: 'node 1.a,b',
        direction: EdgeDirection.RIGHT,
        rightId: 'node_2',
      });
    });

    it('keeps a dash that precedes the arrow in the left id', () => {
      expect(parseEdgeId('A-->B')).toEqual({ leftId: 'A-', direction: EdgeDirection.RIGHT, rightId: 'B' });
    });

    it('throws EdgeIdParseError without a direction token', () => {
      expect(() => parseEdgeId('not-an-edge')).toThrow(EdgeIdParseError);
    });
  });

  describe('safeParseEdgeId', () => {
    it('returns the error with the offending id and expected pattern', () => {
      const result = safeParseEdgeId('not-an-edge');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.edgeId).toBe('not-an-edge');
      expect(result.error.pattern).toBe(EDGE_ID_PATTERN);
      expect(result.error.kind).toBe('MALFORMED_EDGE_ID');
      expect(result.error.message).toBe(`Edge 'not-an-edge' does not seem to conform to '${EDGE_ID_PATTERN}'`);
    });

    it.each(['A->B->C', '->B', 'A->', '', 'A=>B', 'A->B!', 'A<->B'])('rejects %p', (edgeId) => {
      expect(safeParseEdgeId(edgeId).success).toBe(false);
    });
  });
});

import { createEdge, createNode, parseGraphDescription } from '../../../services/graph/GraphModel';
import { InvalidGraphDescriptionError } from '../../../types/UploadErrors';

describe('GraphModel', () => {
  describe('createNode', () => {
    it('builds a frozen node', () => {
      const node = createNode('A', { label: 'Person', properties: { name: 'A', age: 31 } });

      expect(node).toEqual({ kind: 'node', label: 'Person', properties: { name: 'A', age: 31 } });
      expect(Object.isFrozen(node)).toBe(true);
      expect(Object.isFrozen(node.properties)).toBe(true);
    });

    it('defaults missing properties to an empty mapping', () => {
      expect(createNode('A', { label: 'Person' }).properties).toEqual({});
    });

    it('keeps null values so serialization can drop them', () => {
      expect(createNode('A', { label: 'Person', properties: { note: null } }).properties).toEqual({ note: null });
    });

    it('reports a missing label with its path', () => {
      let caught: unknown;
      try {
        createNode('A', { properties: {} });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidGraphDescriptionError);
      expect(caught).toMatchObject({
        kind: 'INVALID_DESCRIPTION',
        issues: ['nodes.A.label: Required'],
      });
    });

    it('rejects unknown fields', () => {
      expect(() => createNode('A', { label: 'Person', color: 'red' })).toThrow(/Unrecognized key/);
    });

    it('rejects labels that are not identifiers', () => {
      expect(() => createNode('A', { label: 'Has Space' })).toThrow(InvalidGraphDescriptionError);
    });

    it('rejects nested objects as property values', () => {
      expect(() => createNode('A', { label: 'Person', properties: { meta: { a: 1 } } })).toThrow(
        InvalidGraphDescriptionError
      );
    });

    it('rejects __proto__ as a property key instead of dropping it', () => {
      const data: unknown = JSON.parse('{"label":"Person","properties":{"__proto__":"v","name":"a"}}');

      expect(() => createNode('A', data)).toThrow(
        "Invalid node 'A': nodes.A.properties.__proto__: '__proto__' cannot be used as a property key"
      );
    });
  });

  describe('createEdge', () => {
    it('builds an edge item', () => {
      expect(createEdge('A->B', { label: 'KNOWS' })).toEqual({ kind: 'edge', label: 'KNOWS', properties: {} });
    });

    it('names the edge in the error', () => {
      expect(() => createEdge('A->B', {})).toThrow("Invalid edge 'A->B'");
    });
  });

  describe('parseGraphDescription', () => {
    it('keeps document order for nodes and edges', () => {
      const description = parseGraphDescription({
        nodes: {
          B: { label: 'Person', properties: { name: 'B' } },
          A: { label: 'Person', properties: { name: 'A' } },
        },
        edges: {
          'B->A': { label: 'KNOWS' },
          'A->B': { label: 'KNOWS' },
        },
      });

      expect(Array.from(description.nodes.keys())).toEqual(['B', 'A']);
      expect(Array.from(description.edges.keys())).toEqual(['B->A', 'A->B']);
    });

    it('puts integer-like ids first, in ascending order', () => {
      const description = parseGraphDescription({
        nodes: {
          b: { label: 'Person' },
          '2': { label: 'Person' },
          '1': { label: 'Person' },
        },
      });

      expect(Array.from(description.nodes.keys())).toEqual(['1', '2', 'b']);
    });

    it('rejects __proto__ as a node id', () => {
      const document: unknown = JSON.parse('{"nodes":{"__proto__":{"label":"Person"}}}');

      expect(() => parseGraphDescription(document)).toThrow(
        "Invalid graph description: nodes.__proto__: '__proto__' cannot be used as an id"
      );
    });

    it('treats missing sections as empty', () => {
      const description = parseGraphDescription({ nodes: { A: { label: 'Person' } } });

      expect(description.nodes.size).toBe(1);
      expect(description.edges.size).toBe(0);
    });

    it('allows dangling edge references', () => {
      const description = parseGraphDescription({ edges: { 'A->Z': { label: 'KNOWS' } } });

      expect(description.edges.get('A->Z')?.label).toBe('KNOWS');
    });

    it.each([[[]], [null], ['graph'], [{ nodes: 5 }]])('rejects %p', (document) => {
      expect(() => parseGraphDescription(document)).toThrow(InvalidGraphDescriptionError);
    });
  });
});

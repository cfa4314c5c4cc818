import { describe, it, expect } from 'vitest';
import { classifyNode, extractColumns } from '../../src/businessobjects/outline';
import type { OutlineNode } from '../../src/businessobjects/types';

describe('Universe outline', () => {
  describe('classifyNode', () => {
    it('should classify column-typed nodes without children as leaves', () => {
      expect(classifyNode({ name: 'Revenue', techType: 'Measure' })).toBe('leaf');
      expect(classifyNode({ name: 'Zip', techType: 'Attribute' })).toBe('leaf');
    });

    it('should classify nodes with a child list as containers', () => {
      expect(classifyNode({ name: 'Customer', techType: 'Folder', nodes: { node: [] } })).toBe('container');
    });

    it('should classify a dimension with children as both', () => {
      expect(classifyNode({ name: 'City', techType: 'Dimension', nodes: { node: [] } })).toBe('both');
    });

    it('should classify anything else as other', () => {
      expect(classifyNode({ name: 'Top customers', techType: 'Filter' })).toBe('other');
      expect(classifyNode({ name: 'Untyped' })).toBe('other');
      expect(classifyNode({ name: 'Empty folder', techType: 'Folder', nodes: {} })).toBe('other');
    });
  });

  describe('extractColumns', () => {
    const outline: OutlineNode[] = [
      {
        name: 'Customer',
        techType: 'Folder',
        nodes: {
          node: [
            {
              id: 'DS0.DO1',
              name: 'City',
              techType: 'Dimension',
              dataType: 'String',
              description: 'Customer city',
              nodes: { node: [{ id: 'DS0.DO2', name: 'Zip', techType: 'Attribute' }] },
            },
            { id: 'DS0.DO3', name: 'Country', techType: 'Dimension' },
          ],
        },
      },
      { id: 'DS0.DO4', name: 'Revenue', techType: 'Measure', dataType: 'Numeric' },
      { name: 'Top customers', techType: 'Filter' },
    ];

    it('should emit a dimension and keep walking into its children', () => {
      const names = extractColumns(outline).map(column => column.column_name);

      expect(names).toEqual(['City', 'Zip', 'Country', 'Revenue']);
    });

    it('should fill in default data type and description', () => {
      expect(extractColumns(outline)).toEqual([
        { column_name: 'City', data_type: 'String', description: 'Customer city', objectId: 'DS0.DO1' },
        { column_name: 'Zip', data_type: 'string', description: '', objectId: 'DS0.DO2' },
        { column_name: 'Country', data_type: 'string', description: '', objectId: 'DS0.DO3' },
        { column_name: 'Revenue', data_type: 'Numeric', description: '', objectId: 'DS0.DO4' },
      ]);
    });

    it('should not emit containers that are not column-typed', () => {
      const names = extractColumns([{ name: 'Folder', techType: 'Folder', nodes: { node: [] } }]);

      expect(names).toEqual([]);
    });

    it('should walk deeply nested outlines', () => {
      let node: OutlineNode = { name: 'Leaf', techType: 'Measure' };
      for (let depth = 0; depth < 5000; depth++) {
        node = { name: `Folder ${depth}`, techType: 'Folder', nodes: { node: [node] } };
      }

      expect(extractColumns([node]).map(column => column.column_name)).toEqual(['Leaf']);
    });

    it('should return nothing for an empty outline', () => {
      expect(extractColumns([])).toEqual([]);
    });
  });
});

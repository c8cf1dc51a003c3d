import { MigrationError } from './migration.error';
import { Migration, TableSchema } from './migration.schema';
import { applyOperation, emptyState, stateFromMigrations } from './project-state';

const itemsTable: TableSchema = {
  name: 'items',
  hashKey: 'id',
  attributes: [
    { name: 'id', type: 'S' },
    { name: 'name', type: 'S' },
  ],
  indexes: [],
};

describe('applyOperation', () => {
  it('should add a created table without touching the previous state', () => {
    const before = emptyState();

    const after = applyOperation(before, { type: 'CreateTable', table: itemsTable });

    expect(after.get('items')).toEqual(itemsTable);
    expect(before.size).toBe(0);
  });

  it('should refuse to create a table twice', () => {
    const state = applyOperation(emptyState(), {
      type: 'CreateTable',
      table: itemsTable,
    });

    expect(() =>
      applyOperation(state, { type: 'CreateTable', table: itemsTable }),
    ).toThrow('Table "items" already exists');
  });

  it('should add and remove indexes', () => {
    let state = applyOperation(emptyState(), {
      type: 'CreateTable',
      table: itemsTable,
    });

    state = applyOperation(state, {
      type: 'AddIndex',
      table: 'items',
      index: { name: 'name-index', hashKey: 'name' },
      attributes: [{ name: 'name', type: 'S' }],
    });
    expect(state.get('items')?.indexes).toEqual([
      { name: 'name-index', hashKey: 'name' },
    ]);
    // "name" was already declared
    expect(state.get('items')?.attributes).toHaveLength(2);

    state = applyOperation(state, {
      type: 'RemoveIndex',
      table: 'items',
      index: 'name-index',
    });
    expect(state.get('items')?.indexes).toEqual([]);
  });

  it('should fail on unknown tables and indexes', () => {
    expect(() =>
      applyOperation(emptyState(), { type: 'DeleteTable', table: 'items' }),
    ).toThrow(MigrationError);

    const state = applyOperation(emptyState(), {
      type: 'CreateTable',
      table: itemsTable,
    });
    expect(() =>
      applyOperation(state, {
        type: 'RemoveIndex',
        table: 'items',
        index: 'missing-index',
      }),
    ).toThrow('Index "missing-index" does not exist on table "items"');
  });
});

describe('stateFromMigrations', () => {
  it('should replay every migration in order', () => {
    const migrations: Migration[] = [
      {
        name: '0001_initial',
        dependencies: [],
        operations: [{ type: 'CreateTable', table: itemsTable }],
      },
      {
        name: '0002_delete_items',
        dependencies: ['0001_initial'],
        operations: [{ type: 'DeleteTable', table: 'items' }],
      },
    ];

    expect(stateFromMigrations(migrations).size).toBe(0);
    expect(stateFromMigrations(migrations.slice(0, 1)).has('items')).toBe(true);
  });

  it('should name the migration that cannot be replayed', () => {
    const migrations: Migration[] = [
      {
        name: '0001_broken',
        dependencies: [],
        operations: [{ type: 'DeleteTable', table: 'items' }],
      },
    ];

    expect(() => stateFromMigrations(migrations)).toThrow(
      '0001_broken: Table "items" does not exist',
    );
  });
});

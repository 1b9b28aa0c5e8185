import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('inventory_positions', {
    sku: { type: 'text', notNull: true },
    location: { type: 'text', notNull: true },
    on_hand: { type: 'integer', notNull: true, default: 0 },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('inventory_positions', 'pk_inventory_positions', {
    primaryKey: ['sku', 'location']
  });
  pgm.addConstraint('inventory_positions', 'chk_inventory_positions_location', {
    check: "location = upper(location)"
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('inventory_positions');
}

import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('products', {
    sku: { type: 'text', primaryKey: true },
    name: { type: 'text', notNull: true, default: '' },
    unit_price: { type: 'numeric(12,4)', notNull: true, default: 0 },
    pack_size: { type: 'integer', notNull: true, default: 1 },
    carton_weight_lbs: { type: 'numeric(10,3)', notNull: true, default: 15 },
    carton_height_in: { type: 'numeric(10,3)', notNull: true, default: 10 },
    max_cartons_per_pallet: { type: 'integer', notNull: true, default: 20 },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('products', 'chk_products_positive', {
    check: 'unit_price >= 0 AND pack_size >= 1 AND max_cartons_per_pallet >= 1'
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('products');
}

import { index, pgTable, primaryKey, uuid } from 'drizzle-orm/pg-core';
import { containersTable } from './containers.js';
import { shipmentsTable } from './shipments.js';

export const shipmentContainersTable = pgTable(
  'shipment_containers',
  {
    shipmentId: uuid('shipment_id')
      .notNull()
      .references(() => shipmentsTable.id, { onDelete: 'cascade' }),
    containerId: uuid('container_id')
      .notNull()
      .references(() => containersTable.id, { onDelete: 'restrict' }),
  },
  (t) => [
    primaryKey({ columns: [t.shipmentId, t.containerId] }),
    index('idx_shipment_containers_container').on(t.containerId),
  ]
);

import { relations } from 'drizzle-orm';
import { containersTable } from '../containers.js';
import { shipmentContainersTable } from '../shipment-containers.js';
import { shipmentsTable } from '../shipments.js';

export const shipmentContainersRelations = relations(shipmentContainersTable, ({ one }) => ({
  shipment: one(shipmentsTable, {
    fields: [shipmentContainersTable.shipmentId],
    references: [shipmentsTable.id],
  }),
  container: one(containersTable, {
    fields: [shipmentContainersTable.containerId],
    references: [containersTable.id],
  }),
}));

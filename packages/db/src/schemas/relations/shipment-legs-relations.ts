import { relations } from 'drizzle-orm';
import { shipmentLegsTable } from '../shipment-legs.js';
import { shipmentsTable } from '../shipments.js';

export const shipmentLegsRelations = relations(shipmentLegsTable, ({ one }) => ({
  shipment: one(shipmentsTable, {
    fields: [shipmentLegsTable.shipmentId],
    references: [shipmentsTable.id],
  }),
}));

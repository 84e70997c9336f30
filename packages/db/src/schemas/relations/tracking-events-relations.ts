import { relations } from 'drizzle-orm';
import { customsClearanceTable } from '../customs-clearance.js';
import { exceptionsTable } from '../exceptions.js';
import { shipmentsTable } from '../shipments.js';
import { trackingEventsTable } from '../tracking-events.js';

export const trackingEventsRelations = relations(trackingEventsTable, ({ one }) => ({
  shipment: one(shipmentsTable, {
    fields: [trackingEventsTable.shipmentId],
    references: [shipmentsTable.id],
  }),
}));

export const customsClearanceRelations = relations(customsClearanceTable, ({ one }) => ({
  shipment: one(shipmentsTable, {
    fields: [customsClearanceTable.shipmentId],
    references: [shipmentsTable.id],
  }),
}));

export const exceptionsRelations = relations(exceptionsTable, ({ one }) => ({
  shipment: one(shipmentsTable, {
    fields: [exceptionsTable.shipmentId],
    references: [shipmentsTable.id],
  }),
}));

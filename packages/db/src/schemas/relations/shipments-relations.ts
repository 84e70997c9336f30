import { relations } from 'drizzle-orm';
import { customersTable } from '../customers.js';
import { customsClearanceTable } from '../customs-clearance.js';
import { exceptionsTable } from '../exceptions.js';
import { shipmentContainersTable } from '../shipment-containers.js';
import { shipmentLegsTable } from '../shipment-legs.js';
import { shipmentsTable } from '../shipments.js';
import { trackingEventsTable } from '../tracking-events.js';

export const shipmentsRelations = relations(shipmentsTable, ({ one, many }) => ({
  customer: one(customersTable, {
    fields: [shipmentsTable.customerId],
    references: [customersTable.id],
  }),
  legs: many(shipmentLegsTable),
  containers: many(shipmentContainersTable),
  events: many(trackingEventsTable),
  customs: many(customsClearanceTable),
  exceptions: many(exceptionsTable),
}));

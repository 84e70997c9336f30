import { apiKeysTable } from './api-keys.js';
import { carriersTable } from './carriers.js';
import { containersTable } from './containers.js';
import { customersTable } from './customers.js';
import { customsClearanceTable } from './customs-clearance.js';
import { derivedRefreshesTable } from './derived-refreshes.js';
import { exceptionsTable } from './exceptions.js';
import { locationsTable } from './locations.js';
import { shipmentContainersTable } from './shipment-containers.js';
import { shipmentLegsTable } from './shipment-legs.js';
import { shipmentsTable } from './shipments.js';
import { trackingEventsTable } from './tracking-events.js';
import { vesselsTable } from './vessels.js';
import { shipmentContainersRelations } from './relations/shipment-containers-relations.js';
import { shipmentLegsRelations } from './relations/shipment-legs-relations.js';
import { shipmentsRelations } from './relations/shipments-relations.js';
import {
  customsClearanceRelations,
  exceptionsRelations,
  trackingEventsRelations,
} from './relations/tracking-events-relations.js';

export * from './api-keys.js';
export * from './carriers.js';
export * from './containers.js';
export * from './customers.js';
export * from './customs-clearance.js';
export * from './derived-refreshes.js';
export * from './exceptions.js';
export * from './locations.js';
export * from './shipment-containers.js';
export * from './shipment-legs.js';
export * from './shipments.js';
export * from './tracking-events.js';
export * from './vessels.js';
export * from './views.js';
export * from './relations/shipment-containers-relations.js';
export * from './relations/shipment-legs-relations.js';
export * from './relations/shipments-relations.js';
export * from './relations/tracking-events-relations.js';

export const schema = {
  apiKeysTable,
  carriersTable,
  containersTable,
  customersTable,
  customsClearanceTable,
  derivedRefreshesTable,
  exceptionsTable,
  locationsTable,
  shipmentContainersTable,
  shipmentLegsTable,
  shipmentsTable,
  trackingEventsTable,
  vesselsTable,
  shipmentsRelations,
  shipmentLegsRelations,
  shipmentContainersRelations,
  trackingEventsRelations,
  customsClearanceRelations,
  exceptionsRelations,
};

export type Schema = typeof schema;

import {
  integer,
  pgMaterializedView,
  pgView,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';
import { ETA_RISK_VALUES, legStatusEnum, shipmentStatusEnum } from '../enums.js';
import { defaultTimestampOptions } from '../utils.js';

// The view bodies live in sql/schema.sql; these declarations give typed selects.

/** Shipment joined to its highest-sequence leg. Shipments without legs are absent. */
export const shipmentProgressView = pgView('v_shipment_progress', {
  shipmentId: uuid('shipment_id').notNull(),
  referenceNo: text('reference_no').notNull(),
  status: shipmentStatusEnum('status').notNull(),
  etaFinal: timestamp('eta_final', defaultTimestampOptions),
  currentLocationId: uuid('current_location_id'),
  legId: uuid('leg_id').notNull(),
  sequenceNo: integer('sequence_no').notNull(),
  mode: text('mode').notNull(),
  originUnlocode: text('origin_unlocode').notNull(),
  destUnlocode: text('dest_unlocode').notNull(),
  etd: timestamp('etd', defaultTimestampOptions),
  eta: timestamp('eta', defaultTimestampOptions),
  ata: timestamp('ata', defaultTimestampOptions),
  legStatus: legStatusEnum('leg_status').notNull(),
}).existing();

/** ETA risk per shipment. Only as fresh as the last REFRESH (see derived_refreshes). */
export const etaRiskView = pgMaterializedView('mv_eta_risk', {
  shipmentId: uuid('shipment_id').notNull(),
  referenceNo: text('reference_no').notNull(),
  customerId: uuid('customer_id').notNull(),
  destinationId: uuid('destination_id').notNull(),
  legId: uuid('leg_id'),
  eta: timestamp('eta', defaultTimestampOptions),
  etaFinal: timestamp('eta_final', defaultTimestampOptions),
  etaStatus: text('eta_status', { enum: ETA_RISK_VALUES }).notNull(),
}).existing();

export const ETA_RISK_VIEW_NAME = 'mv_eta_risk';

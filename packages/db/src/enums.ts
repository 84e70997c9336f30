import { pgEnum } from 'drizzle-orm/pg-core';

/** Shipment lifecycle */
export const SHIPMENT_STATUS_VALUES = [
  'CREATED',
  'BOOKED',
  'IN_TRANSIT',
  'AT_PORT',
  'CUSTOMS_HOLD',
  'CUSTOMS_CLEARED',
  'OUT_FOR_DELIVERY',
  'DELIVERED',
  'CANCELLED',
  'EXCEPTION',
] as const;
export type ShipmentStatus = (typeof SHIPMENT_STATUS_VALUES)[number];
export const shipmentStatusEnum = pgEnum('shipment_status', SHIPMENT_STATUS_VALUES);

/** Per-leg lifecycle */
export const LEG_STATUS_VALUES = ['PENDING', 'DEPARTED', 'ARRIVED', 'DELAYED', 'CANCELLED'] as const;
export type LegStatus = (typeof LEG_STATUS_VALUES)[number];
export const legStatusEnum = pgEnum('leg_status', LEG_STATUS_VALUES);

/** Tracking event kinds */
export const EVENT_KIND_VALUES = [
  'CREATED',
  'BOOKED',
  'DEPARTED_PORT',
  'ARRIVED_PORT',
  'DISCHARGED',
  'GATE_IN',
  'GATE_OUT',
  'CUSTOMS_HOLD',
  'CUSTOMS_RELEASE',
  'HANDOFF',
  'OUT_FOR_DELIVERY',
  'DELIVERED',
  'DELAY',
  'ETA_UPDATE',
  'EXCEPTION_NOTE',
] as const;
export type EventKind = (typeof EVENT_KIND_VALUES)[number];
export const eventKindEnum = pgEnum('event_type', EVENT_KIND_VALUES);

/** Equipment */
export const CONTAINER_TYPE_VALUES = ['DRY', 'REEFER', 'OPEN_TOP', 'TANK'] as const;
export type ContainerType = (typeof CONTAINER_TYPE_VALUES)[number];
export const containerTypeEnum = pgEnum('container_type', CONTAINER_TYPE_VALUES);

/** ETA risk classification (text column on the materialized view, not a pg enum) */
export const ETA_RISK_VALUES = ['UNKNOWN', 'AT_RISK', 'ON_TRACK'] as const;
export type EtaRisk = (typeof ETA_RISK_VALUES)[number];

// Open vocabularies: stored as text, these are the values the service writes itself.
export const TRANSPORT_MODES = ['OCEAN', 'RAIL', 'TRUCK', 'AIR'] as const;
export const CUSTOMS_STATUSES = ['SUBMITTED', 'HOLD', 'RELEASED'] as const;
export type CustomsStatus = (typeof CUSTOMS_STATUSES)[number];

export const EXCEPTION_SEVERITIES = ['LOW', 'MEDIUM', 'HIGH'] as const;
export type ExceptionSeverity = (typeof EXCEPTION_SEVERITIES)[number];
export const EXCEPTION_CATEGORIES = ['CUSTOMS', 'DELAY', 'DAMAGE', 'DOCUMENTATION', 'OTHER'] as const;

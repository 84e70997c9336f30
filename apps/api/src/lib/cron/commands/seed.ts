import { readFileSync } from 'node:fs';
import { z } from 'zod/v4';
import { CONTAINER_TYPE_VALUES, EVENT_KIND_VALUES, LEG_STATUS_VALUES } from '@tracklane/db';
import {
  CarrierInsertSchema,
  CustomerInsertSchema,
  DetailsSchema,
  LocationInsertSchema,
} from '@tracklane/types';
import { createCarrier, getCarrierByScac } from '../../../modules/catalogs/services/carriers.js';
import {
  createContainer,
  getContainerByNumber,
} from '../../../modules/catalogs/services/containers.js';
import { createCustomer, getCustomerByCode } from '../../../modules/catalogs/services/customers.js';
import { createLocation, getLocationByCode } from '../../../modules/catalogs/services/locations.js';
import { createVessel, getVesselByImo } from '../../../modules/catalogs/services/vessels.js';
import { ingestTrackingEvent } from '../../../modules/events/services/ingest-event.js';
import { attachContainer } from '../../../modules/shipments/services/containers.js';
import { findShipmentByRef } from '../../../modules/shipments/services/get-shipment.js';
import { addLeg } from '../../../modules/shipments/services/legs.js';
import { createShipment } from '../../../modules/shipments/services/shipments.js';
import { daysFrom } from '../utils.js';

export const DEMO_SEED_PATH = new URL('../data/demo-seed.json', import.meta.url);

const DemoLegSchema = z.object({
  sequenceNo: z.number().int().min(1),
  mode: z.string().min(1),
  carrier: z.string().optional(),
  vessel: z.string().optional(),
  origin: z.string(),
  destination: z.string(),
  etdDays: z.number().optional(),
  etaDays: z.number().optional(),
  ataDays: z.number().optional(),
  status: z.enum(LEG_STATUS_VALUES).optional(),
});

const DemoEventSchema = z.object({
  atDays: z.number(),
  event: z.enum(EVENT_KIND_VALUES),
  leg: z.number().int().min(1).optional(),
  location: z.string().optional(),
  container: z.string().optional(),
  details: DetailsSchema.optional(),
});

export const DemoSeedSchema = z.object({
  locations: z.array(LocationInsertSchema),
  carriers: z.array(CarrierInsertSchema),
  customers: z.array(CustomerInsertSchema),
  vessels: z.array(
    z.object({
      name: z.string(),
      imoNumber: z.string(),
      mmsi: z.string().optional(),
      carrierScac: z.string().optional(),
    })
  ),
  containers: z.array(
    z.object({
      containerNo: z.string(),
      type: z.enum(CONTAINER_TYPE_VALUES),
      ownerScac: z.string().optional(),
      reeferSetpointC: z.number().optional(),
    })
  ),
  shipments: z.array(
    z.object({
      referenceNo: z.string(),
      customer: z.string(),
      origin: z.string(),
      destination: z.string(),
      etaFinalDays: z.number().optional(),
      legs: z.array(DemoLegSchema),
      containers: z.array(z.string()).default([]),
      events: z.array(DemoEventSchema).default([]),
    })
  ),
});

export type DemoSeed = z.infer<typeof DemoSeedSchema>;

export function loadDemoSeed(path: URL | string = DEMO_SEED_PATH): DemoSeed {
  return DemoSeedSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
}

async function findOrCreate<T>(find: () => Promise<T | null>, create: () => Promise<T>): Promise<T> {
  return (await find()) ?? create();
}

function lookup<T>(map: ReadonlyMap<string, T>, kind: string, key: string): T {
  const value = map.get(key);
  if (value === undefined) throw new Error(`Demo seed references unknown ${kind} "${key}"`);
  return value;
}

export type SeedSummary = { shipmentsCreated: number; shipmentsSkipped: number; events: number };

/**
 * Loads the demo dataset through the same services the API uses, so events
 * drive status, location and customs/exception side effects. Timestamps are
 * relative to `now`. Catalog rows are reused by business key and shipments
 * that already exist are skipped.
 */
export async function seedDemoData(data: DemoSeed, now = new Date()): Promise<SeedSummary> {
  const locations = new Map<string, string>();
  for (const l of data.locations) {
    const row = await findOrCreate(() => getLocationByCode(l.unlocode), () => createLocation(l));
    locations.set(row.unlocode, row.id);
  }

  const carriers = new Map<string, string>();
  for (const c of data.carriers) {
    const row = await findOrCreate(() => getCarrierByScac(c.scac), () => createCarrier(c));
    carriers.set(row.scac, row.id);
  }

  const customers = new Map<string, string>();
  for (const c of data.customers) {
    const row = await findOrCreate(() => getCustomerByCode(c.accountCode), () => createCustomer(c));
    customers.set(row.accountCode, row.id);
  }

  const vessels = new Map<string, string>();
  for (const v of data.vessels) {
    const row = await findOrCreate(
      () => getVesselByImo(v.imoNumber),
      () =>
        createVessel({
          name: v.name,
          imoNumber: v.imoNumber,
          mmsi: v.mmsi ?? null,
          carrierId: v.carrierScac ? lookup(carriers, 'carrier', v.carrierScac) : null,
        })
    );
    vessels.set(row.imoNumber, row.id);
  }

  const containers = new Map<string, string>();
  for (const c of data.containers) {
    const row = await findOrCreate(
      () => getContainerByNumber(c.containerNo),
      () =>
        createContainer({
          containerNo: c.containerNo,
          type: c.type,
          ownerCarrierId: c.ownerScac ? lookup(carriers, 'carrier', c.ownerScac) : null,
          reeferSetpointC: c.reeferSetpointC ?? null,
        })
    );
    containers.set(row.containerNo, row.id);
  }

  const at = (days: number | undefined) => (days === undefined ? null : daysFrom(now, days));
  const summary: SeedSummary = { shipmentsCreated: 0, shipmentsSkipped: 0, events: 0 };

  for (const s of data.shipments) {
    if (await findShipmentByRef(s.referenceNo)) {
      summary.shipmentsSkipped++;
      continue;
    }

    const shipment = await createShipment({
      referenceNo: s.referenceNo,
      customerId: lookup(customers, 'customer', s.customer),
      originId: lookup(locations, 'location', s.origin),
      destinationId: lookup(locations, 'location', s.destination),
      etaFinal: at(s.etaFinalDays),
    });

    const legIds = new Map<number, string>();
    for (const l of s.legs) {
      const leg = await addLeg(shipment.id, {
        sequenceNo: l.sequenceNo,
        mode: l.mode,
        carrierId: l.carrier ? lookup(carriers, 'carrier', l.carrier) : null,
        vesselId: l.vessel ? lookup(vessels, 'vessel', l.vessel) : null,
        originId: lookup(locations, 'location', l.origin),
        destinationId: lookup(locations, 'location', l.destination),
        etd: at(l.etdDays),
        eta: at(l.etaDays),
        ata: at(l.ataDays),
        status: l.status,
      });
      legIds.set(leg.sequenceNo, leg.id);
    }

    for (const containerNo of s.containers) {
      await attachContainer(shipment.id, lookup(containers, 'container', containerNo));
    }

    const ordered = [...s.events].sort((a, b) => a.atDays - b.atDays);
    for (const e of ordered) {
      await ingestTrackingEvent({
        shipmentId: shipment.id,
        occurredAt: daysFrom(now, e.atDays),
        event: e.event,
        legId: legIds.get(e.leg ?? 1) ?? null,
        containerId: e.container ? lookup(containers, 'container', e.container) : null,
        locationCode: e.location,
        details: e.details ?? null,
      });
      summary.events++;
    }

    summary.shipmentsCreated++;
  }

  return summary;
}

import type { ShipmentCreate } from '@tracklane/types';
import { createCustomer } from '../../src/modules/catalogs/services/customers.js';
import { createLocation } from '../../src/modules/catalogs/services/locations.js';
import { createShipment } from '../../src/modules/shipments/services/shipments.js';

export const T0 = new Date('2025-03-01T08:00:00.000Z');

/** T0 shifted by whole or fractional hours. */
export const at = (hours: number) => new Date(T0.getTime() + hours * 3_600_000);

export type Network = Awaited<ReturnType<typeof seedNetwork>>;

/** One customer and three ports: Shanghai, Rotterdam, Los Angeles. */
export async function seedNetwork() {
  const customer = await createCustomer({ name: 'Acme Retail', accountCode: 'ACME01' });
  const sha = await createLocation({
    name: 'Shanghai',
    unlocode: 'CNSHA',
    countryCode: 'CN',
    tz: 'Asia/Shanghai',
  });
  const rtm = await createLocation({
    name: 'Rotterdam',
    unlocode: 'NLRTM',
    countryCode: 'NL',
    tz: 'Europe/Amsterdam',
  });
  const lax = await createLocation({
    name: 'Los Angeles',
    unlocode: 'USLAX',
    countryCode: 'US',
    tz: 'America/Los_Angeles',
  });
  return { customer, sha, rtm, lax };
}

/** Shanghai to Los Angeles unless overridden. */
export function seedShipment(net: Network, referenceNo: string, overrides: Partial<ShipmentCreate> = {}) {
  return createShipment({
    customerId: net.customer.id,
    referenceNo,
    originId: net.sha.id,
    destinationId: net.lax.id,
    ...overrides,
  });
}

import { asc, eq } from 'drizzle-orm';
import { containersTable, db, shipmentContainersTable } from '@tracklane/db';
import { withPgErrors } from '../../../lib/pg-errors.js';

/** Links a container to a shipment; linking the same pair again is a no-op. */
export async function attachContainer(
  shipmentId: string,
  containerId: string
): Promise<{ linked: boolean }> {
  return withPgErrors(async () => {
    const rows = await db
      .insert(shipmentContainersTable)
      .values({ shipmentId, containerId })
      .onConflictDoNothing()
      .returning({ containerId: shipmentContainersTable.containerId });
    return { linked: rows.length > 0 };
  });
}

export async function listShipmentContainers(shipmentId: string) {
  const rows = await db
    .select({ container: containersTable })
    .from(shipmentContainersTable)
    .innerJoin(containersTable, eq(containersTable.id, shipmentContainersTable.containerId))
    .where(eq(shipmentContainersTable.shipmentId, shipmentId))
    .orderBy(asc(containersTable.containerNo));
  return rows.map((r) => r.container);
}

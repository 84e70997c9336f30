import { check, doublePrecision, pgTable, text, uniqueIndex, uuid } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

export const locationsTable = pgTable(
  'locations',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    name: text('name').notNull(),
    // UN/LOCODE, e.g. NLRTM
    unlocode: text('unlocode').notNull(),
    countryCode: text('country_code').notNull(),
    tz: text('tz').notNull(),
    lat: doublePrecision('lat'),
    lon: doublePrecision('lon'),
  },
  (t) => [
    uniqueIndex('ux_locations_unlocode').on(t.unlocode),
    check('ck_locations_unlocode', sql`${t.unlocode} ~ '^[A-Z]{2}[A-Z2-9]{3}$'`),
    check('ck_locations_country_code', sql`${t.countryCode} ~ '^[A-Z]{2}$'`),
  ]
);

// Business-key shapes shared by the catalogs, the API boundary and the SDK.

/** UN/LOCODE: ISO 3166 country + 3-char location (digits 2-9 allowed). */
export const UNLOCODE_RE = /^[A-Z]{2}[A-Z2-9]{3}$/;
export const COUNTRY_CODE_RE = /^[A-Z]{2}$/;
/** Standard Carrier Alpha Code. */
export const SCAC_RE = /^[A-Z]{2,4}$/;
export const IMO_RE = /^[0-9]{7}$/;
export const MMSI_RE = /^[0-9]{9}$/;
/** ISO 6346 container number: owner code, category (U/J/Z), 6-digit serial, check digit. */
export const CONTAINER_NO_RE = /^[A-Z]{3}[UJZ][0-9]{7}$/;

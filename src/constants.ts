export const DEFAULT_WTSS_HOST = "http://www.dpi.inpe.br/tws";

export const WTSS_HOST_ENV = "WTSS_HOST";
export const WTSS_TIMEOUT_ENV = "WTSS_TIMEOUT_MS";

export const LATITUDE_RANGE = { min: -90, max: 90 } as const;
export const LONGITUDE_RANGE = { min: -180, max: 180 } as const;

/** Fractional digits written for coordinates in time_series queries. */
export const COORDINATE_DIGITS = 6;

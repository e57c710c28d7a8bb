/**
 * Common type definitions used throughout the project
 */

/**
 * Cloud-assigned appliance identifier
 */
export type ApplianceId = number;

/**
 * Unix timestamp in seconds
 */
export type TimestampSec = number;

/**
 * Any value that survives JSON round-tripping
 */
export type JSONValue =
  | string
  | number
  | boolean
  | null
  | JSONValue[]
  | { [key: string]: JSONValue };

/**
 * Plain JSON object (cloud response bodies, raw device detail)
 */
export type JSONObject = { [key: string]: JSONValue };

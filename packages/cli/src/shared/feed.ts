import { z } from "zod";
import type { AggregateEnvelope, RegionSnapshot } from "../types";

/**
 * Aggregator feed schemas.
 *
 * The aggregator reports one object per region using kebab-case field names; durations are
 * integer nanoseconds. The export file written at the end of a run uses the same names.
 */

const count = z.number().int().nonnegative();
const nanoseconds = z.number().int().nonnegative();
const rate = z.number().nonnegative();

// Per-region aggregate as sent by the aggregator. Missing figures read as 0.
export const WireRegionSchema = z.object({
  region: z.string().min(1).optional(),
  "total-reqs": count.default(0),
  "tot-bytes-read": count.default(0),
  "ave-time-for-req": nanoseconds.default(0),
  "ave-req-per-sec": rate.default(0),
  "ave-kbytes-per-sec": rate.default(0),
  slowest: nanoseconds.default(0),
  fastest: nanoseconds.default(0),
  "tot-timed-out": count.default(0),
  statuses: z.record(z.string(), count).default({}),
});

export type WireRegion = z.infer<typeof WireRegionSchema>;

// One tick of the feed: every region's latest aggregate
export const WireEnvelopeSchema = z.object({
  regions: z.record(z.string().min(1), WireRegionSchema),
  "total-expected-requests": count.optional(),
  finished: z.boolean().optional(),
});

export type WireEnvelope = z.infer<typeof WireEnvelopeSchema>;

export interface FeedTick {
  readonly envelope: AggregateEnvelope;
  readonly finished: boolean;
}

/**
 * Validate a feed payload, flattening zod issues into a single message
 */
export function parseFeedPayload<S extends z.ZodTypeAny>(schema: S, data: unknown, context?: string): z.infer<S> {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
  throw new Error(`Feed payload validation failed${context ? ` for ${context}` : ""}: ${issues}`);
}

export function fromWireRegion(key: string, wire: WireRegion): RegionSnapshot {
  return {
    region: wire.region ?? key,
    totalRequests: wire["total-reqs"],
    totalBytesRead: wire["tot-bytes-read"],
    averageTimeNs: wire["ave-time-for-req"],
    averageRequestsPerSecond: wire["ave-req-per-sec"],
    averageKBytesPerSecond: wire["ave-kbytes-per-sec"],
    slowestNs: wire.slowest,
    fastestNs: wire.fastest,
    totalTimedOut: wire["tot-timed-out"],
    statuses: { ...wire.statuses },
  };
}

export function toWireRegion(snapshot: RegionSnapshot): WireRegion {
  return {
    region: snapshot.region,
    "total-reqs": snapshot.totalRequests,
    "tot-bytes-read": snapshot.totalBytesRead,
    "ave-time-for-req": snapshot.averageTimeNs,
    "ave-req-per-sec": snapshot.averageRequestsPerSecond,
    "ave-kbytes-per-sec": snapshot.averageKBytesPerSecond,
    slowest: snapshot.slowestNs,
    fastest: snapshot.fastestNs,
    "tot-timed-out": snapshot.totalTimedOut,
    statuses: { ...snapshot.statuses },
  };
}

/**
 * Parse one feed payload into an envelope.
 * `fallbackExpected` is used when the aggregator does not report an expected request count.
 */
export function parseFeedTick(data: unknown, fallbackExpected: number, context?: string): FeedTick {
  const wire = parseFeedPayload(WireEnvelopeSchema, data, context);

  const regions: Record<string, RegionSnapshot> = {};
  for (const [key, region] of Object.entries(wire.regions)) {
    regions[key] = fromWireRegion(key, region);
  }

  return {
    envelope: {
      regions,
      totalExpectedRequests: wire["total-expected-requests"] ?? fallbackExpected,
    },
    finished: wire.finished ?? false,
  };
}

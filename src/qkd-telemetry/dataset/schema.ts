/**
 * QKD Telemetry - Raw Row Schema
 *
 * zod schema of one raw telemetry CSV row. Cells arrive as strings and are
 * coerced; the two buffer columns default to 0 for files written without
 * them.
 */

import { z } from 'zod';
import { TelemetrySample } from '../types/telemetry';

const finite = z.coerce.number().finite();
const count = z.coerce.number().int().nonnegative();

export const FaultTypeSchema = z.enum(['normal', 'qber', 'degrade', 'node_fail', 'blinding', 'trojan']);

export const RawTelemetryRowSchema = z.object({
  timestamp_ps: count,
  link: z.string().min(1),
  node: z.string().min(1),
  qber: finite.min(0).max(1),
  key_rate_sifted: finite.nonnegative(),
  key_rate_final: finite.nonnegative(),
  detection_count: count,
  error_count: count,
  dark_count_rate: finite.nonnegative(),
  detector_efficiency: finite.min(0).max(1),
  back_reflection_power: finite.nonnegative(),
  phase_error_rate: finite.min(0).max(1),
  label: FaultTypeSchema,
  fault_id: z.coerce.number().int().min(0).max(5),
  keys_buffer: count.default(0),
  starvation_events: count.default(0),
});

export type RawTelemetryRow = z.infer<typeof RawTelemetryRowSchema>;

/** Parse one CSV row into a sample, or describe why it is rejected */
export function parseTelemetryRow(
  row: Record<string, string>
): { success: true; sample: TelemetrySample } | { success: false; reason: string } {
  const parsed = RawTelemetryRowSchema.safeParse(row);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : 'row';
    return { success: false, reason: `${where}: ${issue?.message ?? 'invalid'}` };
  }
  return { success: true, sample: parsed.data };
}

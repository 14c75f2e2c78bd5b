import { z } from 'zod';

// --- Regex patterns ---

const MAC_REGEX = /^([0-9A-Fa-f]{2}[:-]){5}[0-9A-Fa-f]{2}$/;
const CB_UUID_REGEX =
  /^[0-9A-Fa-f]{8}-?[0-9A-Fa-f]{4}-?[0-9A-Fa-f]{4}-?[0-9A-Fa-f]{4}-?[0-9A-Fa-f]{12}$/;

// --- Sub-schemas ---

export const DeviceSchema = z.object({
  model: z.enum(['tp902', 'tp904']).default('tp902'),
  address: z
    .string()
    .refine((v) => MAC_REGEX.test(v) || CB_UUID_REGEX.test(v), {
      message: 'Must be a MAC address (XX:XX:XX:XX:XX:XX) or CoreBluetooth UUID',
    })
    .optional()
    .nullable(),
  name: z.string().min(1, 'Device name must not be empty').optional().nullable(),
});

export const SessionSchema = z.object({
  request_timeout_ms: z.number().int().min(100).max(60_000).default(5_000),
  ack_grace_ms: z.number().int().min(0).max(10_000).default(300),
});

export const BleSchema = z.object({
  scan_timeout_ms: z.number().int().min(1_000).max(300_000).default(10_000),
  connect_timeout_ms: z.number().int().min(1_000).max(120_000).default(20_000),
  noble_driver: z.enum(['abandonware', 'node-ble']).optional().nullable(),
});

export const RuntimeSchema = z.object({
  sync_time_on_connect: z.boolean().default(true),
  debug: z.boolean().default(false),
});

export const AppConfigSchema = z.object({
  version: z.literal(1),
  device: DeviceSchema.default({}),
  session: SessionSchema.default({}),
  ble: BleSchema.default({}),
  runtime: RuntimeSchema.default({}),
});

// --- Inferred types ---

export type DeviceConfig = z.infer<typeof DeviceSchema>;
export type SessionConfig = z.infer<typeof SessionSchema>;
export type BleConfig = z.infer<typeof BleSchema>;
export type RuntimeConfig = z.infer<typeof RuntimeSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

// --- Error formatting ---

export function formatConfigError(error: z.ZodError, source = 'config.yaml'): string {
  const lines = [`Configuration error in ${source}:`, ''];

  for (const issue of error.issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    lines.push(`  ${path}`);
    lines.push(`    ${issue.message}`);
    lines.push('');
  }

  lines.push('See config.yaml.example for the available settings.');

  return lines.join('\n');
}

import { z } from "zod";

const flag = z
  .string()
  .optional()
  .transform((v) => /^(true|1|yes)$/i.test(v ?? ""));

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== "" ? v.trim() : undefined));

export const connectivitySchema = z.enum(["local", "remote", "offline", "auto"]);
export type ConnectivitySetting = z.infer<typeof connectivitySchema>;

const envSchema = z.object({
  WLED_HOST: optionalText,
  WLED_CONNECTIVITY: connectivitySchema.default("auto"),
  WLED_DEMO_MODE: flag,
  WLED_REMOTE_ACCESS: flag,
  WLED_BROKER_RELAY: flag,
  WLED_USER_ID: optionalText,
  WLED_CONTROLLER_ID: optionalText,
  WLED_WEBHOOK_URL: optionalText,
  WLED_QUEUE_URL: optionalText,
  WLED_QUEUE_TOKEN: optionalText,
  WLED_BROKER_URL: optionalText,
  WLED_BROKER_TOKEN: optionalText,
  WLED_STREAM_PORT: z.coerce.number().int().min(1).max(65535).default(4048),
  WLED_RATE_RPS: z.coerce.number().positive().default(5),
});

export type AppConfig = {
  host?: string;
  connectivity: ConnectivitySetting;
  demoMode: boolean;
  remoteAccessEnabled: boolean;
  brokerRelayEnabled: boolean;
  userId?: string;
  controllerId?: string;
  webhookUrl?: string;
  queueUrl?: string;
  queueToken?: string;
  brokerUrl?: string;
  brokerToken?: string;
  streamPort: number;
  rateRps: number;
};

/** Parses the process environment (or any string map). Throws a ZodError on invalid values. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const e = envSchema.parse(env);
  return {
    host: e.WLED_HOST,
    connectivity: e.WLED_CONNECTIVITY,
    demoMode: e.WLED_DEMO_MODE,
    remoteAccessEnabled: e.WLED_REMOTE_ACCESS,
    brokerRelayEnabled: e.WLED_BROKER_RELAY,
    userId: e.WLED_USER_ID,
    controllerId: e.WLED_CONTROLLER_ID,
    webhookUrl: e.WLED_WEBHOOK_URL,
    queueUrl: e.WLED_QUEUE_URL,
    queueToken: e.WLED_QUEUE_TOKEN,
    brokerUrl: e.WLED_BROKER_URL,
    brokerToken: e.WLED_BROKER_TOKEN,
    streamPort: e.WLED_STREAM_PORT,
    rateRps: e.WLED_RATE_RPS,
  };
}

import os from "node:os";
import path from "node:path";
import { z } from "zod";
import {
  DEFAULT_COMMAND_TIMEOUT_S,
  DEFAULT_CPU_THRESHOLD,
  DEFAULT_HOST_CHECK_INTERVAL_S,
  DEFAULT_IMAGE,
  DEFAULT_INSTANCE_CHECK_INTERVAL_S,
  DEFAULT_RAM_THRESHOLD,
  DEFAULT_STORAGE_POOL,
  PORT_RANGE
} from "./constants";
import { ValidationError } from "./errors";

const toggleSchema = z
  .enum(["on", "off", "true", "false", "1", "0"])
  .default("on")
  .transform((value) => value === "on" || value === "true" || value === "1");

const configSchema = z
  .object({
    home: z.string().min(1),
    toolBin: z.string().min(1).optional(),
    mainAdminId: z.string().trim().min(1, "WARDEN_MAIN_ADMIN_ID is required"),
    actorId: z.string().trim().min(1).optional(),
    storagePool: z.string().min(1).default(DEFAULT_STORAGE_POOL),
    image: z.string().min(1).default(DEFAULT_IMAGE),
    cpuThreshold: z.coerce.number().gt(0).max(100).default(DEFAULT_CPU_THRESHOLD),
    ramThreshold: z.coerce.number().gt(0).max(100).default(DEFAULT_RAM_THRESHOLD),
    hostCheckIntervalS: z.coerce.number().int().positive().default(DEFAULT_HOST_CHECK_INTERVAL_S),
    instanceCheckIntervalS: z.coerce.number().int().positive().default(DEFAULT_INSTANCE_CHECK_INTERVAL_S),
    commandTimeoutS: z.coerce.number().int().positive().default(DEFAULT_COMMAND_TIMEOUT_S),
    portRangeStart: z.coerce.number().int().min(1).max(65535).default(PORT_RANGE.start),
    portRangeEnd: z.coerce.number().int().min(1).max(65535).default(PORT_RANGE.end),
    hostGuardEnabled: toggleSchema,
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info")
  })
  .refine((value) => value.portRangeStart <= value.portRangeEnd, {
    message: "WARDEN_PORT_RANGE_START must not exceed WARDEN_PORT_RANGE_END",
    path: ["portRangeStart"]
  });

export type WardenConfig = z.infer<typeof configSchema>;

const ENV_NAMES: Record<string, string> = {
  home: "WARDEN_HOME",
  toolBin: "WARDEN_TOOL_BIN",
  mainAdminId: "WARDEN_MAIN_ADMIN_ID",
  actorId: "WARDEN_ACTOR",
  storagePool: "WARDEN_STORAGE_POOL",
  image: "WARDEN_IMAGE",
  cpuThreshold: "WARDEN_CPU_THRESHOLD",
  ramThreshold: "WARDEN_RAM_THRESHOLD",
  hostCheckIntervalS: "WARDEN_HOST_CHECK_INTERVAL",
  instanceCheckIntervalS: "WARDEN_INSTANCE_CHECK_INTERVAL",
  commandTimeoutS: "WARDEN_COMMAND_TIMEOUT",
  portRangeStart: "WARDEN_PORT_RANGE_START",
  portRangeEnd: "WARDEN_PORT_RANGE_END",
  hostGuardEnabled: "WARDEN_HOST_GUARD",
  logLevel: "WARDEN_LOG_LEVEL"
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WardenConfig {
  const raw: Record<string, string | undefined> = {};
  for (const [key, name] of Object.entries(ENV_NAMES)) {
    const value = env[name]?.trim();
    raw[key] = value ? value : undefined;
  }
  raw.home = raw.home ?? path.join(os.homedir(), ".warden");
  raw.mainAdminId = raw.mainAdminId ?? "";
  if (raw.logLevel) {
    raw.logLevel = raw.logLevel.toLowerCase();
  }
  if (raw.hostGuardEnabled) {
    raw.hostGuardEnabled = raw.hostGuardEnabled.toLowerCase();
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const key = String(issue.path[0] ?? "");
      return `${ENV_NAMES[key] ?? key}: ${issue.message}`;
    });
    throw new ValidationError("Invalid configuration.", {
      detail: problems.join("\n"),
      hint: "Check the WARDEN_* environment variables."
    });
  }
  return parsed.data;
}

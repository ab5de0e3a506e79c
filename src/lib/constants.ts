export const CLI_NAME = "warden";
export const VERSION = "0.1.0";

export const INSTANCE_PREFIX = "warden-";
export const TOOL_TOKEN = "lxc";
export const TOOL_BINARY_CANDIDATES = ["/snap/bin/lxc", "/usr/bin/lxc", "/usr/local/bin/lxc"] as const;

export const DEFAULT_IMAGE = "ubuntu:22.04";
export const DEFAULT_STORAGE_POOL = "default";

export const DEFAULT_CPU_THRESHOLD = 90;
export const DEFAULT_RAM_THRESHOLD = 90;
export const DEFAULT_HOST_CHECK_INTERVAL_S = 60;
export const DEFAULT_INSTANCE_CHECK_INTERVAL_S = 600;
export const DEFAULT_COMMAND_TIMEOUT_S = 120;

export const PORT_RANGE = {
  start: 10_000,
  end: 19_999
} as const;

export const AUTO_SYSTEM_ACTOR = "auto-system";
export const SUCCESS_MARKER = "ok";
export const CONFIRMATION_TTL_MS = 60_000;
export const SUSPENSION_LOG_DISPLAY_LIMIT = 10;
export const DEFAULT_LOG_LINES = 50;
export const MAX_LOG_LINES = 1000;

export const STATE_FILES = {
  instances: "instances.json",
  admins: "admins.json",
  ports: "ports.json",
  daemon: "daemon.json"
} as const;

import { DEFAULT_LOG_LINES, MAX_LOG_LINES } from "./constants";
import { ExecutionError, ValidationError } from "./errors";
import type { ToolExecutor } from "./executor";
import { roundTo } from "./utils";

export interface MemoryUsage {
  usedMb: number;
  totalMb: number;
  percent: number;
}

export interface DiskUsage {
  size: string;
  used: string;
  percent: string;
}

export interface UsageSample {
  cpu: number;
  ram: number;
}

/** CPU usage from the `%Cpu(s)` summary line of `top -bn1`, as 100 minus idle. */
export function parseTopCpuUsage(output: string): number | null {
  const line = output.split("\n").find((item) => item.includes("%Cpu(s)"));
  if (!line) {
    return null;
  }
  const match = /([\d.]+)\s*id\b/.exec(line);
  if (!match) {
    return null;
  }
  const idle = Number.parseFloat(match[1]);
  if (!Number.isFinite(idle)) {
    return null;
  }
  return roundTo(100 - idle);
}

/** Reads the `Mem:` row of `free -m`. */
export function parseFreeMemory(output: string): MemoryUsage | null {
  const lines = output.split("\n").map((line) => line.trim()).filter(Boolean);
  const row = lines.find((line) => line.startsWith("Mem:")) ?? lines[1];
  if (!row) {
    return null;
  }
  const parts = row.split(/\s+/);
  const totalMb = Number.parseInt(parts[1] ?? "", 10);
  const usedMb = Number.parseInt(parts[2] ?? "", 10);
  if (!Number.isFinite(totalMb) || !Number.isFinite(usedMb)) {
    return null;
  }
  const percent = totalMb > 0 ? roundTo((usedMb / totalMb) * 100) : 0;
  return { usedMb, totalMb, percent };
}

/** Reads the row mounted at `/` from `df -h /`. */
export function parseDiskUsage(output: string): DiskUsage | null {
  for (const line of output.split("\n").slice(1)) {
    const parts = line.trim().split(/\s+/);
    if (parts.length >= 6 && parts[parts.length - 1] === "/") {
      return { size: parts[1], used: parts[2], percent: parts[4] };
    }
  }
  return null;
}

export function parseInfoStatus(output: string): string | null {
  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.startsWith("Status:")) {
      const value = trimmed.slice("Status:".length).trim();
      return value ? value.toLowerCase() : null;
    }
  }
  return null;
}

export function formatMemory(memory: MemoryUsage): string {
  return `${memory.usedMb}/${memory.totalMb} MB (${memory.percent.toFixed(1)}%)`;
}

export function formatDisk(disk: DiskUsage): string {
  return `${disk.used}/${disk.size} (${disk.percent})`;
}

export interface HostSampler {
  cpuPercent(): Promise<number>;
}

export class HostCpuSampler implements HostSampler {
  constructor(private readonly executor: ToolExecutor) {}

  async cpuPercent(): Promise<number> {
    const output = await this.executor.execute(["top", "-bn1"]);
    const usage = parseTopCpuUsage(output);
    if (usage === null) {
      throw new ExecutionError("Could not read host CPU usage from top output.");
    }
    return usage;
  }
}

export class InstanceProbe {
  constructor(private readonly executor: ToolExecutor) {}

  async status(id: string): Promise<string> {
    const output = await this.executor.execute(["lxc", "info", id]);
    const status = parseInfoStatus(output);
    if (!status) {
      throw new ExecutionError(`No status reported for ${id}.`);
    }
    return status;
  }

  async cpuPercent(id: string): Promise<number> {
    const output = await this.executor.execute(["lxc", "exec", id, "--", "top", "-bn1"]);
    const usage = parseTopCpuUsage(output);
    if (usage === null) {
      throw new ExecutionError(`Could not read CPU usage of ${id}.`);
    }
    return usage;
  }

  async memory(id: string): Promise<MemoryUsage> {
    const output = await this.executor.execute(["lxc", "exec", id, "--", "free", "-m"]);
    const memory = parseFreeMemory(output);
    if (!memory) {
      throw new ExecutionError(`Could not read memory usage of ${id}.`);
    }
    return memory;
  }

  async disk(id: string): Promise<DiskUsage> {
    const output = await this.executor.execute(["lxc", "exec", id, "--", "df", "-h", "/"]);
    const disk = parseDiskUsage(output);
    if (!disk) {
      throw new ExecutionError(`Could not read disk usage of ${id}.`);
    }
    return disk;
  }

  async processes(id: string): Promise<string> {
    return await this.executor.execute(["lxc", "exec", id, "--", "ps", "aux"]);
  }

  async logs(id: string, lines = DEFAULT_LOG_LINES): Promise<string> {
    if (!Number.isInteger(lines) || lines < 1 || lines > MAX_LOG_LINES) {
      throw new ValidationError(`Log lines must be an integer between 1 and ${MAX_LOG_LINES}, got ${lines}.`);
    }
    return await this.executor.execute(["lxc", "exec", id, "--", "journalctl", "-n", String(lines), "--no-pager"]);
  }

  async sample(id: string): Promise<UsageSample> {
    const cpu = await this.cpuPercent(id);
    const memory = await this.memory(id);
    return { cpu, ram: memory.percent };
  }
}

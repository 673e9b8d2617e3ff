import { errorMessage } from "../errors";

/** Reads the process resident set size, in megabytes. */
export interface MemoryProbe {
  residentSetMb(): number;
}

export const processMemoryProbe: MemoryProbe = {
  residentSetMb: () => process.memoryUsage().rss / 1024 / 1024,
};

export const noopMemoryProbe: MemoryProbe = {
  residentSetMb: () => 0,
};

/** Undefined when the probe throws or reads a non-finite value. */
export function readResidentSetMb(probe: MemoryProbe): number | undefined {
  try {
    const value = probe.residentSetMb();
    return Number.isFinite(value) ? value : undefined;
  } catch (error) {
    console.warn("Memory probe failed:", errorMessage(error));
    return undefined;
  }
}

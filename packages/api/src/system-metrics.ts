import os from 'os';

interface CpuTimes {
  idle: number;
  total: number;
}

let previous: CpuTimes | null = null;

function readCpuTimes(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of os.cpus()) {
    const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
    idle += cpuIdle;
    total += user + nice + sys + cpuIdle + irq;
  }
  return { idle, total };
}

function round(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * CPU utilisation in percent since the previous call (since boot on the
 * first call).
 */
export function sampleCpuUsage(): number {
  const current = readCpuTimes();
  const base = previous ?? { idle: 0, total: 0 };
  previous = current;

  const totalDelta = current.total - base.total;
  if (totalDelta <= 0) {
    return 0;
  }
  return round(100 * (1 - (current.idle - base.idle) / totalDelta));
}

/**
 * Share of physical memory in use, in percent
 */
export function sampleMemoryUsage(): number {
  const total = os.totalmem();
  if (total === 0) {
    return 0;
  }
  return round(100 * (1 - os.freemem() / total));
}

import { describe, it, expect, vi } from 'vitest';
import os from 'os';
import { sampleCpuUsage, sampleMemoryUsage } from '../../src/system-metrics.js';

const cpu = (idle: number, busy: number): os.CpuInfo => ({
  model: 'test',
  speed: 1000,
  times: { user: busy, nice: 0, sys: 0, idle, irq: 0 },
});

describe('system metrics', () => {
  it('computes memory usage from free and total memory', () => {
    vi.spyOn(os, 'totalmem').mockReturnValue(8000);
    vi.spyOn(os, 'freemem').mockReturnValue(2000);

    expect(sampleMemoryUsage()).toBe(75);
  });

  it('computes cpu usage between two samples', () => {
    const cpus = vi.spyOn(os, 'cpus');
    cpus.mockReturnValue([cpu(100, 100)]);
    sampleCpuUsage();

    cpus.mockReturnValue([cpu(130, 170)]);

    expect(sampleCpuUsage()).toBe(70);
  });

  it('reports 0 when no time has passed', () => {
    vi.spyOn(os, 'cpus').mockReturnValue([cpu(10, 10)]);
    sampleCpuUsage();

    expect(sampleCpuUsage()).toBe(0);
  });
});

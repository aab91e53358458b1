import { describe, it, expect } from 'vitest';
import { FaultCatalog, FaultCatalogError, DEFAULT_FAULT_CONFIGS } from '../catalog.js';

describe('FaultCatalog', () => {
  it('holds the default configuration for every kind', () => {
    const catalog = new FaultCatalog();

    expect(catalog.kinds()).toEqual(['CPU_OVERLOAD', 'MEMORY_LEAK', 'DISK_FILL', 'IO_STRESS']);
    expect(catalog.get('CPU_OVERLOAD')).toEqual({
      impactFactor: 1.5,
      recoverySteps: 5,
      metricsAffected: ['cpu_usage'],
      cooldownSeconds: 300,
      maxDurationSeconds: 60,
      cascadeProbability: 0.3,
    });
    expect(catalog.get('IO_STRESS').metricsAffected).toEqual(['disk_usage', 'cpu_usage']);
  });

  it('recognises only known kinds', () => {
    const catalog = new FaultCatalog();

    expect(catalog.has('MEMORY_LEAK')).toBe(true);
    expect(catalog.has('network_partition')).toBe(false);
    expect(catalog.has('memory_leak')).toBe(false);
  });

  it('merges overrides over the defaults', () => {
    const catalog = new FaultCatalog({ DISK_FILL: { cooldownSeconds: 0, recoverySteps: 2 } });

    expect(catalog.get('DISK_FILL').cooldownSeconds).toBe(0);
    expect(catalog.get('DISK_FILL').recoverySteps).toBe(2);
    expect(catalog.get('DISK_FILL').impactFactor).toBe(DEFAULT_FAULT_CONFIGS.DISK_FILL.impactFactor);
    expect(catalog.get('CPU_OVERLOAD').cooldownSeconds).toBe(300);
  });

  it('freezes its entries', () => {
    const catalog = new FaultCatalog();
    const config = catalog.get('CPU_OVERLOAD');

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.metricsAffected)).toBe(true);
  });

  it('rejects invalid overrides', () => {
    expect(() => new FaultCatalog({ CPU_OVERLOAD: { recoverySteps: 0 } })).toThrow(FaultCatalogError);
    expect(() => new FaultCatalog({ CPU_OVERLOAD: { cascadeProbability: 1.5 } })).toThrow(
      'Invalid configuration for CPU_OVERLOAD: cascadeProbability must be within [0, 1]'
    );
    expect(() => new FaultCatalog({ MEMORY_LEAK: { maxDurationSeconds: 0 } })).toThrow(FaultCatalogError);
    expect(() => new FaultCatalog({ MEMORY_LEAK: { impactFactor: 0.5 } })).toThrow(FaultCatalogError);
  });
});

import { describe, it, expect } from 'vitest';
import * as modelscan from '../src/index.js';

describe('Public API', () => {
  it('exports VERSION constant', () => {
    const version: '0.1.0' = modelscan.VERSION;
    expect(version).toBe('0.1.0');
  });

  it('exports the registry entry point', () => {
    expect(typeof modelscan.ModelRegistry.initialize).toBe('function');
    expect(typeof modelscan.defineConfiguration).toBe('function');
    expect(typeof modelscan.createDeploymentContext).toBe('function');
  });

  it('exposes the discovery defaults', () => {
    expect(modelscan.DISCOVERY_DEFAULTS).toEqual({
      ENUMERATION: 'auto',
      OUTPUT_MARKERS: ['bin', 'classes', 'dist'],
      UNIT_EXTENSIONS: ['.js', '.mjs', '.cjs'],
      LOG_LEVEL: 'info',
    });
    expect(modelscan.SECONDARY_UNIT_COUNTER).toEqual({ STORE: 'multidex.version', KEY: 'dex.number' });
  });
});

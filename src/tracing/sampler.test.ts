import { describe, it, expect } from 'vitest';
import { AlwaysOffSampler, AlwaysOnSampler, ParentBasedSampler } from '@opentelemetry/sdk-trace-base';
import { createSampler, suppressesSampledHeader } from './sampler.js';

describe('createSampler', () => {
  it('records every trace for always-on and silent-on', () => {
    expect(createSampler('always-on')).toBeInstanceOf(AlwaysOnSampler);
    expect(createSampler('silent-on')).toBeInstanceOf(AlwaysOnSampler);
  });

  it('drops every trace for always-off', () => {
    expect(createSampler('always-off')).toBeInstanceOf(AlwaysOffSampler);
  });

  it('follows the parent for parent-based', () => {
    expect(createSampler('parent-based')).toBeInstanceOf(ParentBasedSampler);
  });
});

describe('suppressesSampledHeader', () => {
  it('is set only for silent-on', () => {
    expect(suppressesSampledHeader('silent-on')).toBe(true);
    expect(suppressesSampledHeader('always-on')).toBe(false);
    expect(suppressesSampledHeader('always-off')).toBe(false);
    expect(suppressesSampledHeader('parent-based')).toBe(false);
  });
});

import { describe, it, expect } from 'vitest';
import { REGION_CATALOGUE, fitLongestEdge, getRegion, regionRectangle } from '../regions.js';
import { buildInstruction } from '../instructions.js';

describe('region catalogue', () => {
  it('lists the seven regions in voting order', () => {
    expect(REGION_CATALOGUE.map(r => r.name)).toEqual([
      'full',
      'upper-junction',
      'main-junction',
      'lower-junction',
      'center-shaft',
      'upper-section',
      'base-section',
    ]);
  });

  it('looks regions up by name', () => {
    expect(getRegion('main-junction').box).toEqual({ left: 0.3, top: 0.25, right: 0.7, bottom: 0.55 });
  });
});

describe('regionRectangle', () => {
  it('covers the whole image for the full region', () => {
    expect(regionRectangle(getRegion('full').box, 800, 600)).toEqual({ left: 0, top: 0, width: 800, height: 600 });
  });

  it('converts fractions to pixels', () => {
    expect(regionRectangle(getRegion('upper-junction').box, 1000, 1000)).toEqual({
      left: 350,
      top: 150,
      width: 300,
      height: 300,
    });
    expect(regionRectangle(getRegion('center-shaft').box, 800, 600)).toEqual({
      left: 320,
      top: 180,
      width: 160,
      height: 300,
    });
  });

  it('keeps at least one pixel on tiny images', () => {
    expect(regionRectangle(getRegion('center-shaft').box, 1, 1)).toEqual({ left: 0, top: 0, width: 1, height: 1 });
  });
});

describe('fitLongestEdge', () => {
  it('shrinks large crops to the maximum edge', () => {
    expect(fitLongestEdge(2000, 1000)).toEqual({ width: 1024, height: 512 });
  });

  it('enlarges small crops to the minimum edge', () => {
    expect(fitLongestEdge(100, 50)).toEqual({ width: 256, height: 128 });
  });

  it('leaves crops within bounds untouched', () => {
    expect(fitLongestEdge(500, 300)).toEqual({ width: 500, height: 300 });
  });

  it('never produces a zero edge', () => {
    expect(fitLongestEdge(3, 4000)).toEqual({ width: 1, height: 1024 });
  });
});

describe('buildInstruction', () => {
  const region = getRegion('base-section');

  it('places the region focus before the answer format', () => {
    const instruction = buildInstruction(region);

    expect(instruction).toContain(`\n\n${region.focus}\n\nAnswer in exactly this format:`);
    expect(instruction.endsWith('Reasoning: <one sentence about the visual evidence>')).toBe(true);
    expect(instruction).not.toContain('Lessons from earlier corrections');
  });

  it('adds hints as a bulleted block after the focus', () => {
    const instruction = buildInstruction(region, ['first hint', 'second hint']);

    expect(instruction).toContain(
      `${region.focus}\n\nLessons from earlier corrections:\n- first hint\n- second hint\n\nAnswer in exactly this format:`
    );
  });
});

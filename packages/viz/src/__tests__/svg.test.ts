/**
 * Tests for SVG export
 */

import { describe, it, expect } from 'vitest';
import { plotOrbital } from '../plot';
import { escapeXml, renderSvg } from '../svg';

const planar = { quantumNumbers: [2, 1, 0], mode: 'real' as const, plane: 'x' as const, resolution: 21 };

describe('escapeXml', () => {
  it('escapes markup characters', () => {
    expect(escapeXml(`<a & "b">'`)).toBe('&lt;a &amp; &quot;b&quot;&gt;&apos;');
  });
});

describe('renderSvg', () => {
  it('writes a standalone document', () => {
    const svg = renderSvg(plotOrbital(planar));

    expect(svg.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<svg ')).toBe(true);
    expect(svg).toContain(
      '<svg xmlns="http://www.w3.org/2000/svg" width="456" height="472" viewBox="0 0 456 472">'
    );
    expect(svg.endsWith('</svg>\n')).toBe(true);
    expect(svg).toContain('>Hydrogen Orbital n=2, l=1, m=0 | mode=real | slice=x-plane</text>');
    expect(svg).toContain('>Y / a0</text>');
    expect(svg).toContain('>Z / a0</text>');
  });

  it('embeds the filled surface as a PNG', () => {
    const svg = renderSvg(plotOrbital({ ...planar, nodalLines: false }));
    expect(svg).toContain('href="data:image/png;base64,');
    expect(svg).not.toContain('<path');
  });

  it('traces dashed negative contours in line mode', () => {
    const svg = renderSvg(plotOrbital({ ...planar, lineMode: true }));
    expect(svg).not.toContain('<image');
    expect(svg).toContain('stroke-dasharray="4 3"');
  });

  it('draws only solid contours for a density', () => {
    const svg = renderSvg(plotOrbital({ ...planar, mode: 'density', lineMode: true }));
    expect(svg).toContain('<path');
    expect(svg).not.toContain('stroke-dasharray');
  });

  it('overlays the nodal line on signed fields by default', () => {
    const svg = renderSvg(plotOrbital(planar));
    expect(svg).toContain('stroke="#a8a8a8" stroke-width="0.9"');
    expect(renderSvg(plotOrbital({ ...planar, nodalLines: false }))).not.toContain('#a8a8a8');
  });

  it('adds a colorbar when requested', () => {
    const svg = renderSvg(plotOrbital({ ...planar, colorbar: true }));
    expect(svg).toContain('<linearGradient id="colorbar"');
    expect(svg).toContain('width="552" height="472"');
    expect(renderSvg(plotOrbital(planar), { colorbar: true })).toContain('fill="url(#colorbar)"');
  });

  it('labels side-by-side panels', () => {
    const svg = renderSvg(plotOrbital({ ...planar, mode: 'real_imag', plane: 'z' }));
    expect(svg).toContain('width="888" height="492"');
    expect(svg).toContain('>Real Part</text>');
    expect(svg).toContain('>Imaginary Part</text>');
  });

  it('ticks harmonic axes in units of pi', () => {
    const svg = renderSvg(
      plotOrbital({ quantumNumbers: [2, 1, 1], mode: 'spherical_harmonic', resolution: 9 })
    );
    expect(svg).toContain('>-1.0</text>');
    expect(svg).toContain('>phi / pi</text>');
    expect(svg).toContain('>theta / pi</text>');
  });

  it('draws the radial distribution as a curve without a colorbar', () => {
    const svg = renderSvg(
      plotOrbital({ quantumNumbers: [2, 0], mode: 'radial_distribution', resolution: 51, colorbar: true })
    );
    expect(svg).toContain('<polyline');
    expect(svg).toContain('stroke="#1f4e79"');
    expect(svg).not.toContain('linearGradient');
  });

  it('scales panels with panelSize', () => {
    const svg = renderSvg(plotOrbital(planar), { panelSize: 200 });
    expect(svg).toContain('width="296" height="312"');
  });
});

import type { Path, VerticalMetrics } from '../types/font';
import { pathSegments } from './geometry';

function formatNumber(value: number): string {
  return String(Math.round(value * 100) / 100);
}

/** SVG path data in font units (y up). */
export function pathsToPathData(paths: readonly Path[]): string {
  return paths
    .map((path) => {
      const { segments } = pathSegments(path);
      if (segments.length === 0) {
        return '';
      }
      const start = segments[0].p0;
      const commands = [`M${formatNumber(start.x)} ${formatNumber(start.y)}`];
      for (const segment of segments) {
        if (segment.kind === 'line') {
          commands.push(`L${formatNumber(segment.p1.x)} ${formatNumber(segment.p1.y)}`);
        } else {
          const points = [segment.p1, segment.p2, segment.p3].map((p) => `${formatNumber(p.x)} ${formatNumber(p.y)}`);
          commands.push(`C${points.join(' ')}`);
        }
      }
      commands.push('Z');
      return commands.join(' ');
    })
    .filter((data) => data.length > 0)
    .join(' ');
}

export function pathDataToSVG(pathData: string, width: number, metrics: Pick<VerticalMetrics, 'ascender' | 'descender'>): string {
  const height = metrics.ascender - metrics.descender;
  return `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${formatNumber(width)} ${formatNumber(height)}">
  <path d="${pathData}" transform="scale(1,-1) translate(0,-${formatNumber(metrics.ascender)})"/>
</svg>`;
}

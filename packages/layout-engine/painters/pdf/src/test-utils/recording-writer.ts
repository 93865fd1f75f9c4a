/**
 * Test-only PdfWriter that records every call as a readable line.
 *
 * DO NOT import this file from production code. Only *.test.ts and
 * other test-utils/ files may import from here.
 */

import type { ImageHandle, PageInfo, PdfWriter, ResolvedStyle, Rgb } from '@pagewright/contracts';

const color = (fill: Rgb): string => `rgb(${fill.r},${fill.g},${fill.b})`;

export type RecordingWriter = PdfWriter & { calls: string[] };

export function createRecordingWriter(): RecordingWriter {
  const calls: string[] = [];
  return {
    calls,
    beginPage(page: PageInfo) {
      calls.push(`begin ${page.number} ${page.size.w}x${page.size.h}`);
    },
    drawText(x: number, baselineY: number, text: string, style: ResolvedStyle) {
      calls.push(`text ${x},${baselineY} "${text}" ${style.fontFamily} ${style.fontSize}`);
    },
    drawRect(x: number, y: number, width: number, height: number, fill: Rgb) {
      calls.push(`rect ${x},${y} ${width}x${height} ${color(fill)}`);
    },
    drawImage(x: number, y: number, width: number, height: number, image: ImageHandle) {
      calls.push(`image ${x},${y} ${width}x${height} ${image.id}`);
    },
    endPage(page: PageInfo) {
      calls.push(`end ${page.number}`);
    },
  };
}

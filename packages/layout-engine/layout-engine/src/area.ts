import type { DrawInstruction, ElementKind, ImageHandle, ResolvedStyle, Rgb } from '@pagewright/contracts';

/** Content overflow recorded while rendering; the paginator stamps the page number. */
export type OverflowReport = {
  elementKind: ElementKind;
  axis: 'width' | 'height';
  overflow: number;
};

type AreaBuffer = {
  instructions: DrawInstruction[];
  overflows: OverflowReport[];
};

const createBuffer = (): AreaBuffer => ({ instructions: [], overflows: [] });

const translate = (instruction: DrawInstruction, dx: number, dy: number): DrawInstruction => ({
  ...instruction,
  x: instruction.x + dx,
  y: instruction.y + dy,
});

/**
 * Drawable rectangle handed to an element's render call.
 *
 * The width is fixed for the area's lifetime and the remaining height only
 * shrinks as the owner advances. Coordinates passed to the draw methods are
 * relative to the area's current top-left corner. Derived views (`sub`,
 * `inset`, `column`) share the draw buffer; a `fork` buffers its drawing until
 * `commit` so tentative work (a table row that may not fit) can be dropped.
 */
export class LayoutArea {
  private offsetY = 0;

  private constructor(
    private readonly buffer: AreaBuffer,
    private readonly parent: AreaBuffer | null,
    readonly x: number,
    private readonly originY: number,
    readonly width: number,
    private readonly initialHeight: number,
    private readonly freshAtStart: boolean,
  ) {}

  /** Root area of a page; fresh until something consumes height. */
  static create(x: number, y: number, width: number, height: number): LayoutArea {
    return new LayoutArea(createBuffer(), null, x, y, Math.max(0, width), Math.max(0, height), true);
  }

  /** Top edge of the unconsumed part, in page coordinates. */
  get y(): number {
    return this.originY + this.offsetY;
  }

  /** Remaining height. */
  get height(): number {
    return Math.max(0, this.initialHeight - this.offsetY);
  }

  get consumed(): number {
    return this.offsetY;
  }

  /** True while nothing has been consumed above this area on its page. */
  get isFresh(): boolean {
    return this.freshAtStart && this.offsetY === 0;
  }

  get instructions(): readonly DrawInstruction[] {
    return this.buffer.instructions;
  }

  get overflows(): readonly OverflowReport[] {
    return this.buffer.overflows;
  }

  get hasContent(): boolean {
    return this.offsetY > 0 || this.buffer.instructions.length > 0;
  }

  advance(dy: number): void {
    if (!(dy > 0)) return;
    this.offsetY = Math.min(this.initialHeight, this.offsetY + dy);
  }

  /** View of the unconsumed part of this area. */
  sub(): LayoutArea {
    return new LayoutArea(this.buffer, null, this.x, this.y, this.width, this.height, this.isFresh);
  }

  inset(left: number, top: number, right: number, bottom: number): LayoutArea {
    return new LayoutArea(
      this.buffer,
      null,
      this.x + left,
      this.y + top,
      Math.max(0, this.width - left - right),
      Math.max(0, this.height - top - bottom),
      this.isFresh,
    );
  }

  /** Vertical strip starting `offset` from the left edge. */
  column(offset: number, width: number): LayoutArea {
    return new LayoutArea(this.buffer, null, this.x + offset, this.y, Math.max(0, width), this.height, this.isFresh);
  }

  /** Same geometry, treated as the top of a page. */
  asFresh(): LayoutArea {
    return new LayoutArea(this.buffer, null, this.x, this.y, this.width, this.height, true);
  }

  fork(): LayoutArea {
    return new LayoutArea(createBuffer(), this.buffer, this.x, this.y, this.width, this.height, this.isFresh);
  }

  /** Moves everything drawn on a fork into the area it was forked from. */
  commit(): void {
    if (!this.parent) return;
    this.parent.instructions.push(...this.buffer.instructions);
    this.parent.overflows.push(...this.buffer.overflows);
    this.buffer.instructions.length = 0;
    this.buffer.overflows.length = 0;
  }

  drawText(dx: number, baseline: number, text: string, style: ResolvedStyle, width: number): void {
    this.buffer.instructions.push({ kind: 'text', x: this.x + dx, y: this.y + baseline, text, style, width });
  }

  drawRect(dx: number, dy: number, width: number, height: number, fill: Rgb): void {
    if (!(width > 0) || !(height > 0)) return;
    this.buffer.instructions.push({ kind: 'rect', x: this.x + dx, y: this.y + dy, width, height, fill });
  }

  drawImage(dx: number, dy: number, width: number, height: number, image: ImageHandle): void {
    this.buffer.instructions.push({ kind: 'image', x: this.x + dx, y: this.y + dy, width, height, image });
  }

  /** Places instructions positioned relative to (dx, dy). */
  place(instructions: readonly DrawInstruction[], dx: number, dy: number): void {
    for (const instruction of instructions) {
      this.buffer.instructions.push(translate(instruction, this.x + dx, this.y + dy));
    }
  }

  reportOverflow(report: OverflowReport): void {
    this.buffer.overflows.push(report);
  }
}

import {
  LayoutError,
  isLayoutError,
  type DrawInstruction,
  type Layout,
  type Page,
  type PdfWriter,
} from '@pagewright/contracts';

export type PdfPainterOptions = {
  /** Called after each page has been handed to the writer. */
  onPagePainted?: (page: Page) => void;
};

export type PdfPainter = {
  paint(layout: Layout): void;
};

const callWriter = (operation: string, fn: () => void): void => {
  try {
    fn();
  } catch (error) {
    if (isLayoutError(error)) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new LayoutError(
      'COLLABORATOR_FAILURE',
      `pdf writer failed during ${operation}: ${reason}`,
      { collaborator: 'pdf writer', operation },
      { cause: error },
    );
  }
};

function paintInstruction(instruction: DrawInstruction, writer: PdfWriter): void {
  switch (instruction.kind) {
    case 'text':
      callWriter('drawText', () => writer.drawText(instruction.x, instruction.y, instruction.text, instruction.style));
      return;
    case 'rect':
      callWriter('drawRect', () =>
        writer.drawRect(instruction.x, instruction.y, instruction.width, instruction.height, instruction.fill),
      );
      return;
    case 'image':
      callWriter('drawImage', () =>
        writer.drawImage(instruction.x, instruction.y, instruction.width, instruction.height, instruction.image),
      );
      return;
  }
}

/** Replays one page's instructions in draw order between beginPage and endPage. */
export function paintPage(page: Page, writer: PdfWriter): void {
  const info = { number: page.number, size: page.size, margins: page.margins };
  callWriter('beginPage', () => writer.beginPage(info));
  for (const instruction of page.instructions) {
    paintInstruction(instruction, writer);
  }
  callWriter('endPage', () => writer.endPage(info));
}

export function paintLayout(layout: Layout, writer: PdfWriter): void {
  for (const page of layout.pages) {
    paintPage(page, writer);
  }
}

export function createPdfPainter(writer: PdfWriter, options: PdfPainterOptions = {}): PdfPainter {
  return {
    paint(layout: Layout): void {
      for (const page of layout.pages) {
        paintPage(page, writer);
        options.onPagePainted?.(page);
      }
    },
  };
}

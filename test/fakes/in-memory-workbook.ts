import {
  EMPTY_CELL,
  type CellValue,
} from "../../src/core/domain/entities/cell-value.entity.js";
import type {
  InputSheet,
  InputWorkbook,
  ITemplateLoader,
  IWorkbookReader,
  OutputSheet,
  OutputWorkbook,
} from "../../src/core/domain/services/workbook.service.js";

export type SheetCells = Record<string, CellValue>;

const COLUMN_LETTERS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";

export function address(row: number, column: number): string {
  return `${COLUMN_LETTERS[column - 1]}${row}`;
}

export class InMemorySheet implements InputSheet {
  constructor(
    readonly name: string,
    private cells: SheetCells,
    private reads: { count: number },
  ) {}

  readCell(addr: string): CellValue {
    this.reads.count += 1;
    return this.cells[addr] ?? EMPTY_CELL;
  }

  readCellAt(row: number, column: number): CellValue {
    return this.readCell(address(row, column));
  }
}

export interface WorkbookFixture {
  sheets: Array<{ name: string; cells?: SheetCells }>;
  /** Thrown from the first cell read, to simulate a broken sheet. */
  failOnRead?: Error;
}

export class InMemoryWorkbook implements InputWorkbook {
  closed = false;
  readonly reads = { count: 0 };

  constructor(private fixture: WorkbookFixture) {}

  get sheetNames(): string[] {
    return this.fixture.sheets.map((s) => s.name);
  }

  sheet(index: number): InputSheet {
    const s = this.fixture.sheets[index];
    if (!s) throw new RangeError(`No sheet at index ${index}.`);
    const failure = this.fixture.failOnRead;
    if (failure) {
      return {
        name: s.name,
        readCell: () => {
          throw failure;
        },
        readCellAt: () => {
          throw failure;
        },
      };
    }
    return new InMemorySheet(s.name, s.cells ?? {}, this.reads);
  }

  close(): void {
    this.closed = true;
  }
}

/** Serves workbooks by path; an Error entry is thrown from `open`. */
export class InMemoryWorkbookReader implements IWorkbookReader {
  readonly opened: InMemoryWorkbook[] = [];

  constructor(private files: Record<string, WorkbookFixture | Error>) {}

  async open(filePath: string): Promise<InputWorkbook> {
    const entry = this.files[filePath];
    if (entry === undefined) throw new Error(`Unexpected path ${filePath}`);
    if (entry instanceof Error) throw entry;
    const workbook = new InMemoryWorkbook(entry);
    this.opened.push(workbook);
    return workbook;
  }
}

export class InMemoryOutputSheet implements OutputSheet {
  readonly cells = new Map<string, CellValue>();
  readonly writeOrder: string[] = [];

  writeCell(addr: string, value: CellValue): void {
    this.cells.set(addr, value);
    this.writeOrder.push(addr);
  }

  get(addr: string): CellValue | undefined {
    return this.cells.get(addr);
  }
}

export class InMemoryOutputWorkbook implements OutputWorkbook {
  readonly sheet = new InMemoryOutputSheet();
  readonly savedTo: string[] = [];
  saveError: Error | null = null;

  async save(filePath: string): Promise<void> {
    if (this.saveError) throw this.saveError;
    this.savedTo.push(filePath);
  }
}

export class InMemoryTemplateLoader implements ITemplateLoader {
  readonly workbook = new InMemoryOutputWorkbook();
  loadError: Error | null = null;

  async load(_templatePath: string): Promise<OutputWorkbook> {
    if (this.loadError) throw this.loadError;
    return this.workbook;
  }
}

import fs from 'fs';
import { Load, REQUIRED_LOAD_COLUMNS, OPTIONAL_LOAD_COLUMNS } from '../types';
import { NotFoundError } from '../middleware/errorHandler';
import { parseCsv, CsvRow, CsvSyntaxError } from '../utils/csv';
import logger from '../utils/logger';

type LoadColumn = (typeof REQUIRED_LOAD_COLUMNS)[number] | (typeof OPTIONAL_LOAD_COLUMNS)[number];

// Dataset missing or malformed. Fatal at startup, never a per-request error.
export class DataLoadError extends Error {
  source: string;
  line?: number;

  constructor(message: string, source: string, line?: number) {
    super(line === undefined ? `${source}: ${message}` : `${source}:${line}: ${message}`);
    this.name = 'DataLoadError';
    this.source = source;
    this.line = line;
  }
}

const POSITIVE_INT = /^[1-9]\d*$/;

const parseNumber = (value: string): number | null => {
  if (value === '') return null;
  const num = Number(value.replace(/[$,]/g, ''));
  return Number.isFinite(num) ? num : null;
};

/**
 * Read-only, in-memory index of the load dataset keyed by `load_id`.
 *
 * Built once, before the server accepts requests, and never mutated after
 * that, so concurrent lookups need no coordination. Datasets that do not fit
 * in memory are out of scope; they would need chunked ingestion into an
 * external store behind the same `getById` contract.
 */
export class LoadRepository {
  private readonly loads: ReadonlyMap<number, Load>;
  readonly source: string;

  private constructor(loads: Map<number, Load>, source: string) {
    this.loads = loads;
    this.source = source;
  }

  static fromFile(filePath: string): LoadRepository {
    let text: string;
    try {
      text = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DataLoadError(`cannot read dataset (${reason})`, filePath);
    }
    return LoadRepository.fromCsv(text, filePath);
  }

  static fromCsv(text: string, source: string = '<inline>'): LoadRepository {
    let rows: CsvRow[];
    try {
      rows = parseCsv(text);
    } catch (error) {
      if (error instanceof CsvSyntaxError) {
        throw new DataLoadError(error.message, source, error.line);
      }
      throw error;
    }

    const [header, ...body] = rows;
    if (!header) {
      throw new DataLoadError('dataset is empty (no header row)', source);
    }

    const columns = new Map<string, number>();
    header.cells.forEach((name, index) => columns.set(name.toLowerCase(), index));

    const missing = REQUIRED_LOAD_COLUMNS.filter((name) => !columns.has(name));
    if (missing.length > 0) {
      throw new DataLoadError(`missing required column(s): ${missing.join(', ')}`, source, header.line);
    }

    const loads = new Map<number, Load>();

    for (const row of body) {
      if (row.cells.length < header.cells.length) {
        throw new DataLoadError(
          `expected ${header.cells.length} cells, found ${row.cells.length}`,
          source,
          row.line
        );
      }

      const cell = (name: LoadColumn): string => {
        const index = columns.get(name);
        return index === undefined ? '' : row.cells[index];
      };

      for (const name of REQUIRED_LOAD_COLUMNS) {
        if (cell(name) === '') {
          throw new DataLoadError(`${name} is empty`, source, row.line);
        }
      }

      const rawId = cell('load_id');
      if (!POSITIVE_INT.test(rawId)) {
        throw new DataLoadError(`load_id "${rawId}" is not a positive integer`, source, row.line);
      }
      const loadId = Number(rawId);
      if (!Number.isSafeInteger(loadId)) {
        throw new DataLoadError(`load_id "${rawId}" exceeds the largest safe integer`, source, row.line);
      }
      if (loads.has(loadId)) {
        throw new DataLoadError(`duplicate load_id ${loadId}`, source, row.line);
      }

      const rate = parseNumber(cell('rate'));
      if (rate === null) {
        throw new DataLoadError(`rate "${cell('rate')}" is not a number`, source, row.line);
      }

      const load: Load = {
        load_id: loadId,
        origin: cell('origin'),
        destination: cell('destination'),
        equipment_type: cell('equipment_type'),
        rate,
        commodity: cell('commodity'),
      };

      if (cell('pickup_date')) load.pickup_date = cell('pickup_date');
      if (cell('delivery_date')) load.delivery_date = cell('delivery_date');
      if (cell('notes')) load.notes = cell('notes');

      if (cell('weight')) {
        const weight = parseNumber(cell('weight'));
        if (weight === null) {
          throw new DataLoadError(`weight "${cell('weight')}" is not a number`, source, row.line);
        }
        load.weight = weight;
      }

      loads.set(loadId, Object.freeze(load));
    }

    if (loads.size === 0) {
      logger.warn('Load dataset has no rows', { source });
    }

    return new LoadRepository(loads, source);
  }

  get size(): number {
    return this.loads.size;
  }

  ids(): number[] {
    return [...this.loads.keys()];
  }

  getById(loadId: number): Load {
    const load = this.loads.get(loadId);
    if (!load) {
      throw new NotFoundError(`Load ${loadId}`);
    }
    return load;
  }
}

export default LoadRepository;

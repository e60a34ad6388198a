/**
 * Load Repository Unit Tests
 */

import path from 'path';
import { LoadRepository, DataLoadError } from '../../../services/loadRepository';
import { NotFoundError } from '../../../middleware/errorHandler';
import logger from '../../../utils/logger';
import { FIXTURE_CSV } from '../../helpers';

const HEADER = 'load_id,origin,destination,equipment_type,rate,commodity';

const loadError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('LoadRepository', () => {
  describe('fromFile', () => {
    it('should index every row of the dataset by load_id', () => {
      const repository = LoadRepository.fromFile(FIXTURE_CSV);

      expect(repository.size).toBe(3);
      expect(repository.ids()).toEqual([101, 102, 103]);
      expect(repository.source).toBe(FIXTURE_CSV);
    });

    it('should map columns to typed load fields', () => {
      const repository = LoadRepository.fromFile(FIXTURE_CSV);

      expect(repository.getById(101)).toEqual({
        load_id: 101,
        origin: 'Dallas, TX',
        destination: 'Atlanta, GA',
        pickup_date: '2026-11-02T08:00:00',
        delivery_date: '2026-11-03T17:00:00',
        equipment_type: 'Dry Van',
        rate: 2150,
        commodity: 'Packaged Food',
        weight: 38000,
      });
    });

    it('should keep quoted notes intact', () => {
      const repository = LoadRepository.fromFile(FIXTURE_CSV);

      expect(repository.getById(102).notes).toBe('Keep at -10F, no co-load');
      expect(repository.getById(102).rate).toBe(3100.5);
    });

    it('should omit empty optional cells and read thousands separators', () => {
      const repository = LoadRepository.fromFile(FIXTURE_CSV);

      expect(repository.getById(103)).toEqual({
        load_id: 103,
        origin: 'Los Angeles, CA',
        destination: 'Phoenix, AZ',
        equipment_type: 'Flatbed',
        rate: 1450,
        commodity: 'Steel Coils',
      });
    });

    it('should yield the same records when loaded twice', () => {
      const first = LoadRepository.fromFile(FIXTURE_CSV);
      const second = LoadRepository.fromFile(FIXTURE_CSV);

      expect(second.ids()).toEqual(first.ids());
      for (const id of first.ids()) {
        expect(second.getById(id)).toEqual(first.getById(id));
      }
    });

    it('should fail with DataLoadError when the file is missing', () => {
      const missing = path.join(__dirname, 'does-not-exist.csv');
      const error = loadError(() => LoadRepository.fromFile(missing));

      expect(error).toBeInstanceOf(DataLoadError);
      expect(error).toMatchObject({ source: missing });
      expect(error instanceof Error ? error.message : '').toContain(`${missing}: cannot read dataset (`);
    });
  });

  describe('fromCsv', () => {
    it('should accept columns in any order and ignore unknown ones', () => {
      const repository = LoadRepository.fromCsv(
        'commodity,rate,equipment_type,destination,origin,load_id,broker\nSteel,900,Flatbed,B,A,7,x'
      );

      expect(repository.getById(7)).toEqual({
        load_id: 7,
        origin: 'A',
        destination: 'B',
        equipment_type: 'Flatbed',
        rate: 900,
        commodity: 'Steel',
      });
    });

    it('should freeze records', () => {
      const repository = LoadRepository.fromCsv(`${HEADER}\n1,A,B,Reefer,500,Ice`);

      expect(Object.isFrozen(repository.getById(1))).toBe(true);
    });

    it('should accept a header-only dataset and warn about it', () => {
      const repository = LoadRepository.fromCsv(`${HEADER}\n`);

      expect(repository.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith('Load dataset has no rows', { source: '<inline>' });
    });

    it('should reject empty text', () => {
      expect(() => LoadRepository.fromCsv('')).toThrow(
        new DataLoadError('dataset is empty (no header row)', '<inline>')
      );
    });

    it('should reject a header without required columns', () => {
      expect(() => LoadRepository.fromCsv('load_id,origin,destination,equipment_type,rate\n1,a,b,c,5')).toThrow(
        '<inline>:1: missing required column(s): commodity'
      );
    });

    it('should reject duplicate load ids with the offending line', () => {
      const error = loadError(() => LoadRepository.fromCsv(`${HEADER}\n1,A,B,Van,5,x\n1,A,B,Van,6,y`, 'loads.csv'));

      expect(error).toBeInstanceOf(DataLoadError);
      expect(error).toMatchObject({
        message: 'loads.csv:3: duplicate load_id 1',
        source: 'loads.csv',
        line: 3,
      });
    });

    it.each([
      ['abc', 'load_id "abc" is not a positive integer'],
      ['0', 'load_id "0" is not a positive integer'],
      ['-4', 'load_id "-4" is not a positive integer'],
      ['1.5', 'load_id "1.5" is not a positive integer'],
    ])('should reject load_id %s', (id, message) => {
      expect(() => LoadRepository.fromCsv(`${HEADER}\n${id},A,B,Van,5,x`)).toThrow(`<inline>:2: ${message}`);
    });

    it('should reject load ids beyond the largest safe integer', () => {
      const error = loadError(() =>
        LoadRepository.fromCsv(`${HEADER}\n9007199254740992,A,B,Van,5,x\n9007199254740993,A,B,Van,6,y`)
      );

      expect(error).toBeInstanceOf(DataLoadError);
      expect(error).toMatchObject({
        message: '<inline>:2: load_id "9007199254740992" exceeds the largest safe integer',
        line: 2,
      });
    });

    it('should accept the largest safe integer as a load id', () => {
      const repository = LoadRepository.fromCsv(`${HEADER}\n9007199254740991,A,B,Van,5,x`);

      expect(repository.ids()).toEqual([Number.MAX_SAFE_INTEGER]);
    });

    it('should reject zero-padded load ids', () => {
      expect(() => LoadRepository.fromCsv(`${HEADER}\n007,A,B,Van,5,x`)).toThrow(
        '<inline>:2: load_id "007" is not a positive integer'
      );
    });

    it('should reject short rows', () => {
      expect(() => LoadRepository.fromCsv(`${HEADER}\n1,A,B`)).toThrow('<inline>:2: expected 6 cells, found 3');
    });

    it('should reject a non-numeric rate', () => {
      expect(() => LoadRepository.fromCsv(`${HEADER}\n1,A,B,Van,cheap,x`)).toThrow(
        '<inline>:2: rate "cheap" is not a number'
      );
    });

    it('should reject an empty required cell', () => {
      expect(() => LoadRepository.fromCsv(`${HEADER}\n1,,B,Van,5,x`)).toThrow('<inline>:2: origin is empty');
    });

    it('should reject a non-numeric weight', () => {
      expect(() => LoadRepository.fromCsv(`${HEADER},weight\n1,A,B,Van,5,x,heavy`)).toThrow(
        '<inline>:2: weight "heavy" is not a number'
      );
    });

    it('should report unterminated quotes as DataLoadError', () => {
      const error = loadError(() => LoadRepository.fromCsv(`${HEADER}\n1,"A,B,Van,5,x`));

      expect(error).toBeInstanceOf(DataLoadError);
      expect(error).toMatchObject({ message: '<inline>:2: Unterminated quoted cell', line: 2 });
    });
  });

  describe('getById', () => {
    const repository = LoadRepository.fromCsv(`${HEADER}\n42,A,B,Van,5,x`);

    it('should return the load for a known id', () => {
      expect(repository.getById(42).load_id).toBe(42);
    });

    it('should throw NotFoundError naming the missing id', () => {
      const error = loadError(() => repository.getById(999));

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ message: 'Load 999 not found', statusCode: 404, code: 'NOT_FOUND' });
    });
  });
});

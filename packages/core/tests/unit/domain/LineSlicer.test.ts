import { describe, it, expect } from 'vitest';
import { sliceLine } from '../../../src/domain/services/LineSlicer.js';

describe('sliceLine', () => {
  describe("'character' offsets", () => {
    it('should slice [start, start + length)', () => {
      const line = sliceLine('000112345.6', 'character');

      expect(line.length).toBe(11);
      expect(line.slice(0, 4)).toEqual({ kind: 'ok', text: '0001' });
      expect(line.slice(4, 10)).toEqual({ kind: 'ok', text: '12345.' });
    });

    it('should report a slice past the end as short', () => {
      expect(sliceLine('0002', 'character').slice(4, 10)).toEqual({ kind: 'short' });
      expect(sliceLine('00021', 'character').slice(4, 10)).toEqual({ kind: 'short' });
    });

    it('should accept a slice ending exactly at the end of the line', () => {
      expect(sliceLine('abcd', 'character').slice(2, 4)).toEqual({ kind: 'ok', text: 'cd' });
    });

    it('should count accented letters as one character each', () => {
      const line = sliceLine('JOSÉ  01', 'character');

      expect(line.length).toBe(8);
      expect(line.slice(0, 6)).toEqual({ kind: 'ok', text: 'JOSÉ  ' });
      expect(line.slice(6, 8)).toEqual({ kind: 'ok', text: '01' });
    });

    it('should count astral code points as one character', () => {
      const line = sliceLine('a😀bc', 'character');

      expect(line.length).toBe(4);
      expect(line.slice(1, 2)).toEqual({ kind: 'ok', text: '😀' });
      expect(line.slice(2, 4)).toEqual({ kind: 'ok', text: 'bc' });
    });
  });

  describe("'byte' offsets", () => {
    it('should count UTF-8 bytes', () => {
      const line = sliceLine('JOSÉ01', 'byte');

      expect(line.length).toBe(7);
      expect(line.slice(0, 5)).toEqual({ kind: 'ok', text: 'JOSÉ' });
      expect(line.slice(5, 7)).toEqual({ kind: 'ok', text: '01' });
    });

    it('should keep a zero-width no-break space at the start of a slice', () => {
      const line = sliceLine('A\uFEFFB', 'byte');

      expect(line.length).toBe(5);
      expect(line.slice(1, 5)).toEqual({ kind: 'ok', text: '\uFEFFB' });
      expect(sliceLine('A\uFEFFB', 'character').slice(1, 3)).toEqual({ kind: 'ok', text: '\uFEFFB' });
    });

    it('should report a slice that cuts a multi-byte character', () => {
      const line = sliceLine('JOSÉ01', 'byte');

      expect(line.slice(0, 4)).toEqual({ kind: 'split' });
      expect(line.slice(4, 6)).toEqual({ kind: 'split' });
    });

    it('should report a slice past the end as short', () => {
      expect(sliceLine('abc', 'byte').slice(1, 4)).toEqual({ kind: 'short' });
    });

    it('should match character offsets for ASCII lines', () => {
      const text = '000112345.6';
      expect(sliceLine(text, 'byte').slice(4, 10)).toEqual(sliceLine(text, 'character').slice(4, 10));
    });
  });
});

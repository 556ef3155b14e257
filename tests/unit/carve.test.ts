import { describe, it, expect } from 'vitest';
import { carveImages, normalizeInput } from '../../src/operations/carve.js';
import { InvalidInputError } from '../../src/errors.js';
import { createJpeg, createPdf, createPng } from '../helpers/create-test-pdf.js';

describe('carveImages', () => {
  const jpeg = createJpeg([0x01, 0x02]);
  const png = createPng([0x03]);
  const pdf = createPdf(png, jpeg);

  it('should report every format in table order', () => {
    const result = carveImages(pdf);

    expect(result.inputSize).toBe(pdf.length);
    expect(result.formats.map(f => f.format)).toEqual(['jpeg', 'png']);
    expect(result.formats.map(f => f.extension)).toEqual(['jpg', 'png']);
    expect(result.formats[0]?.images).toEqual([jpeg]);
    expect(result.formats[1]?.images).toEqual([png]);
  });

  it('should keep ranges and images aligned', () => {
    const [jpegResult] = carveImages(pdf).formats;
    const range = jpegResult?.ranges[0];

    expect(range).toBeDefined();
    expect(jpegResult?.images[0]).toEqual(pdf.slice(range?.start, range?.end));
  });

  it('should restrict to the requested formats', () => {
    const result = carveImages(pdf, { formats: ['png'] });

    expect(result.formats).toHaveLength(1);
    expect(result.formats[0]?.format).toBe('png');
  });

  it('should report empty results for data without images', () => {
    const result = carveImages(createPdf());

    expect(result.formats.map(f => f.ranges)).toEqual([[], []]);
  });

  it('should accept an ArrayBuffer', () => {
    const buffer = new ArrayBuffer(jpeg.length);
    new Uint8Array(buffer).set(jpeg);
    const result = carveImages(buffer);
    expect(result.formats[0]?.ranges).toEqual([{ start: 0, end: jpeg.length, truncated: false }]);
  });

  it('should scan a repeated format only once', () => {
    const result = carveImages(pdf, { formats: ['jpeg', 'png', 'jpeg'] });

    expect(result.formats.map(f => f.format)).toEqual(['jpeg', 'png']);
    expect(result.formats[0]?.images).toEqual([jpeg]);
  });

  it('should accept a base64 data URL', () => {
    const url = `data:application/pdf;base64,${Buffer.from(pdf).toString('base64')}`;
    const result = carveImages(url);

    expect(result.inputSize).toBe(pdf.length);
    expect(result.formats[0]?.images).toEqual([jpeg]);
  });
});

describe('normalizeInput', () => {
  it('should return a Uint8Array unchanged', () => {
    const data = new Uint8Array([1, 2, 3]);
    expect(normalizeInput(data)).toBe(data);
  });

  it('should reject strings that are not data URLs', () => {
    expect(() => normalizeInput('hello')).toThrow(InvalidInputError);
    expect(() => normalizeInput('hello')).toThrow('String input must be a data URL');
  });

  it('should reject data URLs without a payload separator', () => {
    expect(() => normalizeInput('data:application/pdf')).toThrow('Invalid data URL format');
  });

  it('should reject data URLs with a malformed base64 payload', () => {
    const url = 'data:application/pdf;base64,%%%';
    expect(() => normalizeInput(url)).toThrow(InvalidInputError);
    expect(() => normalizeInput(url)).toThrow('Invalid base64 in data URL');
  });
});

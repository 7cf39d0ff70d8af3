import { describe, test, expect } from 'vitest';
import { errorResponse, formatBytes, jsonResponse, parseFileSize } from '../src/utils';

describe('parseFileSize', () => {
  test('parses sizes with and without units', () => {
    expect(parseFileSize('50MB')).toBe(52428800);
    expect(parseFileSize('512 kb')).toBe(524288);
    expect(parseFileSize('1.5KB')).toBe(1536);
    expect(parseFileSize('1GB')).toBe(1073741824);
    expect(parseFileSize('1048576')).toBe(1048576);
  });

  test('rejects anything else', () => {
    expect(() => parseFileSize('big')).toThrow('Invalid file size: big');
    expect(() => parseFileSize('-1MB')).toThrow('Invalid file size: -1MB');
  });
});

describe('formatBytes', () => {
  test('picks the largest fitting unit', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(1048576)).toBe('1.0 MB');
    expect(formatBytes(1073741824)).toBe('1.0 GB');
  });
});

describe('responses', () => {
  test('errorResponse carries the code, no-store and CORS', async () => {
    const response = errorResponse('Nope', 502, 'Network');

    expect(response.status).toBe(502);
    expect(response.headers.get('Cache-Control')).toBe('no-store');
    expect(response.headers.get('Access-Control-Allow-Origin')).toBe('*');
    expect(await response.json()).toEqual({ error: 'Nope', code: 'Network' });
  });

  test('jsonResponse defaults to 200', async () => {
    const response = jsonResponse({ ok: true });

    expect(response.status).toBe(200);
    expect(response.headers.get('Content-Type')).toBe('application/json');
    expect(await response.text()).toBe('{\n  "ok": true\n}');
  });
});

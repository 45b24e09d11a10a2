import { describe, it, expect, vi } from 'vitest';
import {
  isTruthyParam,
  firstQueryValue,
  selectFormat,
  renderSnapshot,
  respondWithSample,
  JSON_CONTENT_TYPE,
  TEXT_CONTENT_TYPE,
} from '../../../src/lib/exposure/render.js';
import type { ReservoirSnapshot } from '../../../src/lib/reservoir/types.js';
import { RenderError } from '../../../src/utils/errors.js';
import { fooBarReservoir } from '../../helpers/reservoirs.js';

describe('isTruthyParam', () => {
  it.each([
    [undefined, false],
    ['', false],
    ['0', false],
    ['f', false],
    ['F', false],
    ['false', false],
    ['FALSE', false],
    ['False', false],
    ['fAlSe', false],
    ['1', true],
    ['true', true],
    ['yes', true],
    ['no', true],
    ['00', true],
  ])('should treat %j as %s', (value, expected) => {
    expect(isTruthyParam(value)).toBe(expected);
  });
});

describe('firstQueryValue', () => {
  it('should return strings as they are', () => {
    expect(firstQueryValue('1')).toBe('1');
  });

  it('should take the first of repeated values', () => {
    expect(firstQueryValue(['0', '1'])).toBe('0');
  });

  it('should ignore nested objects and missing values', () => {
    expect(firstQueryValue({ a: '1' })).toBeUndefined();
    expect(firstQueryValue(undefined)).toBeUndefined();
    expect(firstQueryValue([])).toBeUndefined();
  });
});

describe('selectFormat', () => {
  it('should default to JSON', () => {
    expect(selectFormat({})).toBe('json');
    expect(selectFormat({ t: '0', p: 'false' })).toBe('json');
  });

  it('should pick tabbed text for a truthy t', () => {
    expect(selectFormat({ t: '1' })).toBe('tabbed');
  });

  it('should pick plain text for a truthy p, even when t is set', () => {
    expect(selectFormat({ p: '1' })).toBe('plain');
    expect(selectFormat({ p: 'yes', t: '1' })).toBe('plain');
  });

  it('should treat a bare parameter as false', () => {
    expect(selectFormat({ t: '' })).toBe('json');
  });
});

describe('renderSnapshot', () => {
  const snapshot: ReservoirSnapshot = {
    entries: [
      { content: 'bar', sequenceIndex: 2 },
      { content: 'foo', sequenceIndex: 5 },
    ],
    seen: 6,
  };

  it('should render JSON with parallel arrays', () => {
    const rendered = renderSnapshot(snapshot, 'json');
    expect(rendered.status).toBe(200);
    expect(rendered.contentType).toBe(JSON_CONTENT_TYPE);
    expect(rendered.body).toBe('{"lines":["bar","foo"],"lineNumbers":[2,5],"seen":6}');
  });

  it('should render empty arrays for an empty reservoir', () => {
    expect(renderSnapshot({ entries: [], seen: 0 }, 'json').body).toBe(
      '{"lines":[],"lineNumbers":[],"seen":0}',
    );
    expect(renderSnapshot({ entries: [], seen: 0 }, 'plain').body).toBe('');
  });

  it('should render tab-separated line numbers', () => {
    expect(renderSnapshot(snapshot, 'tabbed')).toEqual({
      status: 200,
      contentType: TEXT_CONTENT_TYPE,
      body: '2\tbar\n5\tfoo\n',
    });
  });

  it('should render plain lines', () => {
    expect(renderSnapshot(snapshot, 'plain').body).toBe('bar\nfoo\n');
  });
});

describe('respondWithSample', () => {
  it('should serve plain text for p=1', () => {
    const rendered = respondWithSample(fooBarReservoir(), { p: '1' });
    expect(rendered.body).toBe('bar\nfoo\n');
    expect(rendered.contentType).toBe(TEXT_CONTENT_TYPE);
  });

  it('should serve tabbed text for t=1', () => {
    const rendered = respondWithSample(fooBarReservoir(), { t: '1' });
    expect(rendered.body).toBe('2\tbar\n5\tfoo\n');
  });

  it('should serve JSON by default', () => {
    const rendered = respondWithSample(fooBarReservoir(), {});
    expect(JSON.parse(rendered.body)).toEqual({
      lines: ['bar', 'foo'],
      lineNumbers: [2, 5],
      seen: 6,
    });
  });

  it('should take exactly one snapshot per request', () => {
    const reservoir = fooBarReservoir();
    const spy = vi.spyOn(reservoir, 'snapshot');

    respondWithSample(reservoir, { t: '1' });

    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('should answer 500 with a diagnostic when rendering fails', () => {
    const reservoir = fooBarReservoir();
    const before = reservoir.snapshot();

    const rendered = respondWithSample(reservoir, {}, () => {
      throw new RenderError('json: cannot serialize');
    });

    expect(rendered).toEqual({
      status: 500,
      contentType: TEXT_CONTENT_TYPE,
      body: 'render error: json: cannot serialize',
    });
    expect(reservoir.snapshot()).toEqual(before);
  });
});

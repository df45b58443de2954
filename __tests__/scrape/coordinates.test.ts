import { describe, it, expect } from 'vitest';
import {
  locationFieldsFromHtml,
  resolveCoordinates,
  resolveCoordinatesFromPage,
  tokenToDecimal
} from '../../src/scrape/coordinates.js';

describe('tokenToDecimal', () => {
  it('should sign decimal degrees by compass letter', () => {
    expect(tokenToDecimal('40.7506°N')).toBe(40.7506);
    expect(tokenToDecimal('73.9935°W')).toBe(-73.9935);
  });

  it('should convert degrees, minutes and seconds', () => {
    expect(tokenToDecimal('40°45′02″N')).toBeCloseTo(40.750556, 5);
    expect(tokenToDecimal('118°16′03″W')).toBeCloseTo(-118.2675, 4);
  });

  it('should honour a leading minus sign, including the unicode one', () => {
    expect(tokenToDecimal('−118.267')).toBe(-118.267);
    expect(tokenToDecimal('-87.6742')).toBe(-87.6742);
  });

  it('should return null when there is no number', () => {
    expect(tokenToDecimal('°')).toBeNull();
  });
});

describe('resolveCoordinates', () => {
  it('should prefer the geo-dec span', () => {
    expect(
      resolveCoordinates({ geoDec: '40.7506°N 73.9935°W', geo: '1; 2', text: '' })
    ).toEqual({ latitude: 40.7506, longitude: -73.9935 });
  });

  it('should read a semicolon or comma separated geo span', () => {
    expect(resolveCoordinates({ geoDec: null, geo: '40.7506; -73.9935', text: '' })).toEqual({
      latitude: 40.7506,
      longitude: -73.9935
    });
    expect(resolveCoordinates({ geoDec: null, geo: '34.043, -118.267', text: '' })).toEqual({
      latitude: 34.043,
      longitude: -118.267
    });
  });

  it('should fall back to compass-lettered decimals in the visible text', () => {
    expect(resolveCoordinates({ geoDec: null, geo: null, text: 'Chicago, Illinois 41.8807°N 87.6742°W' })).toEqual({
      latitude: 41.8807,
      longitude: -87.6742
    });
  });

  it('should take two standalone numbers as a last resort', () => {
    expect(resolveCoordinates({ geoDec: null, geo: null, text: 'at 29.7508 -95.3621' })).toEqual({
      latitude: 29.7508,
      longitude: -95.3621
    });
  });

  it('should reject pairs outside the valid range', () => {
    expect(resolveCoordinates({ geoDec: null, geo: null, text: 'Capacity 19812 and 20917' })).toBeNull();
    expect(resolveCoordinates({ geoDec: null, geo: null, text: 'Chicago, Illinois' })).toBeNull();
  });
});

describe('locationFieldsFromHtml', () => {
  it('should pull out the geo spans and the collapsed cell text', () => {
    const fields = locationFieldsFromHtml(
      'Phoenix,   Arizona <span class="geo-dec">33.4457°N 112.0712°W</span><span class="geo">33.4457; -112.0712</span>'
    );

    expect(fields.geoDec).toBe('33.4457°N 112.0712°W');
    expect(fields.geo).toBe('33.4457; -112.0712');
    expect(fields.text).toBe('Phoenix, Arizona 33.4457°N 112.0712°W33.4457; -112.0712');
  });

  it('should report missing spans as null', () => {
    expect(locationFieldsFromHtml('Denver, Colorado')).toEqual({ geoDec: null, geo: null, text: 'Denver, Colorado' });
  });
});

describe('resolveCoordinatesFromPage', () => {
  it('should use only the geo spans of an article', () => {
    expect(resolveCoordinatesFromPage('<p>Opened 1999, 20917 seats</p><span class="geo">41.8807; -87.6742</span>')).toEqual({
      latitude: 41.8807,
      longitude: -87.6742
    });
    expect(resolveCoordinatesFromPage('<p>Opened 1999 at 41.88 -87.67</p>')).toBeNull();
  });
});

import { describe, expect, it } from 'vitest';
import { canonicalName, compareSerials, namesMateriallyDiffer, preferredName } from '../src/lib/canon.js';
import { dateKeyFromFileName, normalizeCampaignDate, yearsBetween } from '../src/lib/dates.js';
import { parseAltitudeMeters } from '../src/lib/tolerant.js';

describe('canonicalName', () => {
  it('drops rank prefixes, accents and punctuation', () => {
    expect(canonicalName('Lt. Józef  Nowak-Kowalski')).toBe('jozef nowak kowalski');
  });
});

describe('namesMateriallyDiffer', () => {
  it('accepts initials and rank prefixes for the same pilot', () => {
    expect(namesMateriallyDiffer('Lt. J. Smith', 'John Smith')).toBe(false);
    expect(namesMateriallyDiffer('Smith', 'John Smith')).toBe(false);
  });

  it('flags different surnames', () => {
    expect(namesMateriallyDiffer('Smith', 'Jones')).toBe(true);
    expect(namesMateriallyDiffer('A. Smith', 'John Smith')).toBe(true);
  });
});

describe('preferredName', () => {
  it('takes the most complete spelling', () => {
    expect(preferredName(['J. Smith', 'John Smith', 'Smith'])).toBe('John Smith');
    expect(preferredName([])).toBeUndefined();
  });
});

describe('compareSerials', () => {
  it('orders digit strings numerically before other serials', () => {
    expect(['10', 'x2', '9', '009', 'a1'].sort(compareSerials)).toEqual(['009', '9', '10', 'a1', 'x2']);
  });
});

describe('normalizeCampaignDate', () => {
  it('reads every date spelling to ISO form', () => {
    expect(normalizeCampaignDate('19420801')).toBe('1942-08-01');
    expect(normalizeCampaignDate('1942-8-1 09:30')).toBe('1942-08-01');
    expect(normalizeCampaignDate('15/03/1918')).toBe('1918-03-15');
    expect(normalizeCampaignDate('1.8.1942')).toBe('1942-08-01');
  });

  it('rejects impossible dates and unknown spellings', () => {
    expect(normalizeCampaignDate('19430229')).toBeUndefined();
    expect(normalizeCampaignDate('August 1942')).toBeUndefined();
    expect(normalizeCampaignDate(undefined)).toBeUndefined();
  });
});

describe('dateKeyFromFileName', () => {
  it('finds compact and separated dates', () => {
    expect(dateKeyFromFileName('Tester 1942-08-01.mission')).toBe('19420801');
    expect(dateKeyFromFileName('Tester_19420801.mission')).toBe('19420801');
    expect(dateKeyFromFileName('quick.mission')).toBeUndefined();
  });
});

describe('yearsBetween', () => {
  it('counts whole years', () => {
    expect(yearsBetween('1918-03-15', '1942-03-14')).toBe(23);
    expect(yearsBetween('1918-03-15', '1942-03-15')).toBe(24);
    expect(yearsBetween('1950-01-01', '1942-01-01')).toBeUndefined();
  });
});

describe('parseAltitudeMeters', () => {
  it('reads numbers, meters and feet', () => {
    expect(parseAltitudeMeters(1200)).toBe(1200);
    expect(parseAltitudeMeters('1500 meters')).toBe(1500);
    expect(parseAltitudeMeters('5000 ft')).toBe(1524);
    expect(parseAltitudeMeters('2500,5 m')).toBe(2500.5);
    expect(parseAltitudeMeters('high')).toBeUndefined();
  });
});

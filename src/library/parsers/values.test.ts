import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseAmount, parseCount, parseDate } from './values.js';

describe('parseDate', () => {
  it('converts DD/MM/YYYY to an ISO date', () => {
    assert.equal(parseDate('25/11/2023'), '2023-11-25');
    assert.equal(parseDate(' 8/1/2024 '), '2024-01-08');
  });

  it('rejects impossible dates and other formats', () => {
    assert.equal(parseDate('31/02/2024'), null);
    assert.equal(parseDate('2024-01-08'), null);
    assert.equal(parseDate(''), null);
  });
});

describe('parseAmount', () => {
  it('reads comma decimals with currency noise', () => {
    assert.equal(parseAmount('3,20'), 3.2);
    assert.equal(parseAmount('€ 1.234,50'), 1234.5);
    assert.equal(parseAmount('0,00 EUR'), 0);
  });

  it('treats "geen" as zero', () => {
    assert.equal(parseAmount('geen'), 0);
    assert.equal(parseAmount('Geen'), 0);
  });

  it('passes numbers through', () => {
    assert.equal(parseAmount(2.5), 2.5);
    assert.equal(parseAmount(Number.NaN), null);
  });

  it('gives null for anything else', () => {
    assert.equal(parseAmount('onbekend'), null);
    assert.equal(parseAmount(null), null);
  });
});

describe('parseCount', () => {
  it('accepts non-negative integers and digit strings', () => {
    assert.equal(parseCount(5), 5);
    assert.equal(parseCount('12'), 12);
    assert.equal(parseCount('geen'), 0);
  });

  it('is unknown for anything else', () => {
    assert.equal(parseCount(-1), null);
    assert.equal(parseCount(1.5), null);
    assert.equal(parseCount('veel'), null);
    assert.equal(parseCount(undefined), null);
  });
});

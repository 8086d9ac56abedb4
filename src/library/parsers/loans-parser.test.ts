import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { readFileSync } from 'node:fs';
import { TemporarySiteError } from '../../shared/errors.js';
import { Logger } from '../../shared/utils/logger.js';
import { LoansListPageParser, itemIdFromUrl, queryParam, resolveUrl } from './loans-parser.js';

const fixture = (name: string): string => readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');

const BASE_URL = 'https://city.bibliotheek.be';
const parser = new LoansListPageParser(new Logger({ level: 'silent' }));

describe('LoansListPageParser', () => {
  it('parses loans grouped per branch', () => {
    const loans = parser.parse(fixture('loans-extendable.html'), BASE_URL, '123456');

    assert.equal(loans.length, 3);
    assert.deepEqual(loans[0], {
      title: 'Erebus',
      loanFrom: '2023-11-25',
      loanTill: '2023-12-23',
      author: 'Palin, Michael',
      type: 'Boek',
      extendable: true,
      extendUrl: 'https://city.bibliotheek.be/mijn-bibliotheek/lidmaatschappen/123456/uitleningen/verlengen?loan-ids=6207416',
      extendId: '6207416',
      branchName: 'Gent Hoofdbibliotheek',
      id: '1324927',
      url: 'https://city.bibliotheek.be/resolver.ashx?extid=%7Cwise-oostvlaanderen%7C1324927',
      coverUrl: 'https://webservices.bibliotheek.be/index.php?func=cover&ISBN=9789000359325&VLACCnr=10157217&coversize=medium',
      accountId: '123456'
    });
  });

  it('marks loans the site refuses to extend as not extendable', () => {
    const loans = parser.parse(fixture('loans-extendable.html'), BASE_URL, '123456');

    assert.equal(loans[1].title, 'De zee');
    assert.equal(loans[1].branchName, 'Brugge');
    assert.equal(loans[1].type, 'DVD');
    assert.equal(loans[1].author, '');
    assert.equal(loans[1].extendable, false);
    assert.equal(loans[1].extendUrl, '');
    assert.equal(loans[1].extendId, '');
  });

  it('leaves extendability unknown without an extend block', () => {
    const loan = parser.parse(fixture('loans-extendable.html'), BASE_URL, '123456')[2];

    assert.equal(loan.id, '554433');
    assert.equal(loan.branchName, 'Brugge');
    assert.equal(loan.extendable, null);
    assert.equal(loan.extendUrl, '');
    assert.equal(loan.extendId, '');
  });

  it('reads only the loan ids from an extend link with more parameters', () => {
    const page = fixture('loans-extendable.html').replace(
      'loan-ids=6207416"',
      'loan-ids=6207416&amp;destination=/mijn-bibliotheek"'
    );

    const [loan] = parser.parse(page, BASE_URL, '123456');

    assert.equal(
      loan.extendUrl,
      'https://city.bibliotheek.be/mijn-bibliotheek/lidmaatschappen/123456/uitleningen/verlengen?loan-ids=6207416&destination=/mijn-bibliotheek'
    );
    assert.equal(loan.extendId, '6207416');
  });

  it('builds the extend url from the checkbox id', () => {
    const [loan] = parser.parse(fixture('loans-checkbox.html'), BASE_URL, 'account123');

    assert.equal(loan.title, 'Een willekeurige boektitel');
    assert.equal(loan.author, 'Doe, John');
    assert.equal(loan.loanFrom, '2025-01-15');
    assert.equal(loan.loanTill, '2025-02-12');
    assert.equal(loan.extendable, true);
    assert.equal(
      loan.extendUrl,
      'https://city.bibliotheek.be/mijn-bibliotheek/lidmaatschappen/account123/uitleningen/verlengen?loan-ids=abc123'
    );
    assert.equal(loan.extendId, 'abc123');
    assert.equal(loan.id, '4690970');
    assert.equal(loan.coverUrl, 'https://webservices.bibliotheek.be/index.php?func=cover&ISBN=1234567890123&coversize=medium');
  });

  it('returns no loans for empty or unrelated pages', () => {
    assert.deepEqual(parser.parse('', '', ''), []);
    assert.deepEqual(parser.parse('bogus', '', ''), []);
  });

  it('raises TemporarySiteError when the site shows its error banner', () => {
    const html = `<div class="messages messages--error">
      Er is een fout opgetreden bij het ophalen van informatie uit het bibliotheeksysteem.
      Probeer het later opnieuw.
    </div>`;

    assert.throws(() => parser.parse(html, BASE_URL, '123456'), TemporarySiteError);
  });

  it('skips unexpected siblings and uses the default branch before any header', () => {
    const html = `<div class="my-library-user-library-account-loans__loan-wrapper">
      <p>Je hebt 1 uitlening</p>
      <div class="card"><h3 class="my-library-user-library-account-loans__loan-title"><a href="/resolver.ashx?extid=%7Cx%7C42">Kort</a></h3></div>
    </div>`;

    const loans = parser.parse(html, BASE_URL, '123456');

    assert.equal(loans.length, 1);
    assert.equal(loans[0].branchName, '??');
    assert.equal(loans[0].title, 'Kort');
    assert.equal(loans[0].id, '42');
    assert.equal(loans[0].loanFrom, null);
    assert.equal(loans[0].loanTill, null);
  });

  it('splits the wrapper into header and card nodes', () => {
    const nodes = parser.toNodes(fixture('loans-extendable.html'));

    assert.deepEqual(
      nodes.map((node) => node.kind),
      ['header', 'card', 'header', 'card', 'card']
    );
  });
});

describe('itemIdFromUrl', () => {
  it('takes the last encoded pipe segment', () => {
    assert.equal(itemIdFromUrl('https://city.bibliotheek.be/resolver.ashx?extid=%7Cwise-oostvlaanderen%7C1144255'), '1144255');
  });

  it('accepts plain and lowercase encoded pipes', () => {
    assert.equal(itemIdFromUrl('https://x.bibliotheek.be/resolver.ashx?extid=|wise|42'), '42');
    assert.equal(itemIdFromUrl('https://x.bibliotheek.be/resolver.ashx?extid=%7cwise%7c42&lang=nl'), '42');
  });
});

describe('queryParam', () => {
  it('decodes the named parameter', () => {
    assert.equal(queryParam('https://x.bibliotheek.be/a?loan-ids=1%2C2&b=3', 'loan-ids'), '1,2');
  });

  it('gives null for missing parameters and relative urls', () => {
    assert.equal(queryParam('https://x.bibliotheek.be/a?b=3', 'loan-ids'), null);
    assert.equal(queryParam('/a?loan-ids=1', 'loan-ids'), null);
  });
});

describe('resolveUrl', () => {
  it('resolves relative links against the base', () => {
    assert.equal(resolveUrl('/a?b=1', BASE_URL), 'https://city.bibliotheek.be/a?b=1');
  });

  it('returns the href when there is no usable base', () => {
    assert.equal(resolveUrl('/a', ''), '/a');
  });
});

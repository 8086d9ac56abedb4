import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { readFileSync } from 'node:fs';
import {
  ConfigurationError,
  ExtendLoanError,
  IncompatibleSourceError,
  InvalidExtendLoanUrlError,
  ItemAccessError,
  TemporarySiteError
} from '../shared/errors.js';
import { FakeSite, html, json, redirect } from '../test-utils/fake-site.js';
import { MijnBibliotheekClient, buildBaseUrl } from './client.js';
import type { LoginMethod, MijnbibClientConfig } from './types/index.js';

const fixture = (name: string): string =>
  readFileSync(new URL(`./parsers/fixtures/${name}`, import.meta.url), 'utf8');

const BASE = 'https://gent.bibliotheek.be';
const LOANS_URL = `${BASE}/mijn-bibliotheek/lidmaatschappen/123456/uitleningen`;
const RESERVATIONS_URL = `${BASE}/mijn-bibliotheek/lidmaatschappen/123456/reservaties`;
const EXTEND_URL = `${BASE}/mijn-bibliotheek/lidmaatschappen/123456/uitleningen/verlengen?loan-ids=6207416`;

const MEMBERSHIPS = {
  'Dijk92 - Bibliotheek Gent': [
    { id: '123456', hasError: false, libraryName: 'Dijk92 - Bibliotheek Gent', name: 'John Doe', library: 'gent' }
  ],
  'Bibliotheek Brugge': [{ id: '7890', hasError: true, libraryName: 'Bibliotheek Brugge', name: 'Jane Doe' }]
};

/** Site on which the session is already authenticated */
function loggedInSite(): FakeSite {
  return new FakeSite()
    .get(`${BASE}/mijn-bibliotheek/aanmelden`, redirect('/mijn-bibliotheek'))
    .get(`${BASE}/mijn-bibliotheek`, html('<a href="/mijn-bibliotheek/profiel">Profiel</a>'));
}

function createClient(site: FakeSite, config: MijnbibClientConfig = {}): MijnBibliotheekClient {
  return new MijnBibliotheekClient(
    { username: 'johndoe', password: 'test-secret' },
    { city: 'gent', logLevel: 'silent', fetch: site.fetch, ...config }
  );
}

describe('MijnBibliotheekClient', () => {
  describe('login', () => {
    it('logs in once', async () => {
      const site = loggedInSite();
      const client = createClient(site);

      await client.login();
      await client.login();

      assert.equal(client.isAuthenticated(), true);
      assert.equal(site.requests.length, 2);
    });

    it('rejects an unknown login method', () => {
      const loginBy: LoginMethod = JSON.parse('"token"');

      assert.throws(() => createClient(new FakeSite(), { loginBy }), ConfigurationError);
    });
  });

  describe('getAccounts', () => {
    it('combines memberships and activity', async () => {
      const site = loggedInSite()
        .get(`${BASE}/api/my-library/memberships`, json(MEMBERSHIPS))
        .get(`${BASE}/api/my-library/123456/activities`, json({ numberOfLoans: 2, numberOfHolds: 1, openAmount: '0,00' }));

      const accounts = await createClient(site).getAccounts();

      assert.deepEqual(accounts, [
        {
          libraryName: 'Dijk92 - Bibliotheek Gent',
          user: 'John Doe',
          id: '123456',
          loansCount: 2,
          loansUrl: LOANS_URL,
          reservationsCount: 1,
          reservationsUrl: RESERVATIONS_URL,
          openAmounts: 0,
          openAmountsUrl: `${BASE}/mijn-bibliotheek/lidmaatschappen/123456/te-betalen`
        },
        {
          libraryName: 'Bibliotheek Brugge',
          user: 'Jane Doe',
          id: '7890',
          loansCount: null,
          loansUrl: `${BASE}/mijn-bibliotheek/lidmaatschappen/7890/uitleningen`,
          reservationsCount: null,
          reservationsUrl: `${BASE}/mijn-bibliotheek/lidmaatschappen/7890/reservaties`,
          openAmounts: 0,
          openAmountsUrl: `${BASE}/mijn-bibliotheek/lidmaatschappen/7890/te-betalen`
        }
      ]);
      assert.equal(site.requestsTo(`${BASE}/api/my-library/7890/activities`).length, 0);
    });

    it('reports a failing endpoint as temporary', async () => {
      const site = loggedInSite().get(`${BASE}/api/my-library/memberships`, html('oeps', 502));

      await assert.rejects(createClient(site).getAccounts(), TemporarySiteError);
    });

    it('reports a non-JSON answer as incompatible', async () => {
      const site = loggedInSite().get(`${BASE}/api/my-library/memberships`, html('<html>aanmelden</html>'));

      await assert.rejects(createClient(site).getAccounts(), (error: unknown) => {
        assert.ok(error instanceof IncompatibleSourceError);
        assert.equal(error.htmlBody, '<html>aanmelden</html>');
        return true;
      });
    });
  });

  describe('getLoans', () => {
    it('parses the loans page of the account', async () => {
      const site = loggedInSite().get(
        `${BASE}/mijn-bibliotheek/lidmaatschappen/account123/uitleningen`,
        html(fixture('loans-checkbox.html'))
      );

      const loans = await createClient(site).getLoans('account123');

      assert.equal(loans.length, 1);
      assert.equal(loans[0].accountId, 'account123');
      assert.equal(
        loans[0].extendUrl,
        `${BASE}/mijn-bibliotheek/lidmaatschappen/account123/uitleningen/verlengen?loan-ids=abc123`
      );
    });

    it('maps a 404 to ItemAccessError', async () => {
      const site = loggedInSite().get(LOANS_URL, html('Niet gevonden', 404));

      await assert.rejects(createClient(site).getLoans('123456'), {
        name: 'ItemAccessError',
        message: `Loans url can not be opened. Likely incorrect or nonexisting account ID in the url '${LOANS_URL}'`
      });
    });

    it('maps a server error to TemporarySiteError', async () => {
      const site = loggedInSite().get(LOANS_URL, html('Service Unavailable', 503));

      await assert.rejects(createClient(site).getLoans('123456'), TemporarySiteError);
    });

    it('maps other statuses to ItemAccessError', async () => {
      const site = loggedInSite().get(LOANS_URL, html('Verboden', 403));

      await assert.rejects(createClient(site).getLoans('123456'), ItemAccessError);
    });

    it('passes the site error banner through', async () => {
      const banner =
        '<div>Er is een fout opgetreden bij het ophalen van informatie uit het bibliotheeksysteem. Probeer het later opnieuw.</div>';
      const site = loggedInSite().get(LOANS_URL, html(banner));

      await assert.rejects(createClient(site).getLoans('123456'), TemporarySiteError);
    });

    it('wraps parser failures with the page body', async () => {
      const site = loggedInSite().get(LOANS_URL, html('<div>loans</div>'));
      const client = createClient(site, {
        parsers: {
          loans: {
            parse: () => {
              throw new Error('boom');
            }
          }
        }
      });

      await assert.rejects(client.getLoans('123456'), (error: unknown) => {
        assert.ok(error instanceof IncompatibleSourceError);
        assert.equal(error.message, 'Problem scraping loans (boom)');
        assert.equal(error.htmlBody, '<div>loans</div>');
        return true;
      });
    });
  });

  describe('getReservations', () => {
    it('parses the reservations page of the account', async () => {
      const site = loggedInSite().get(RESERVATIONS_URL, html(fixture('reservations.html')));

      const holds = await createClient(site).getReservations('123456');

      assert.deepEqual(
        holds.map((hold) => hold.title),
        ['Vastberaden!', 'Het tuinboek']
      );
    });

    it('maps a 404 to ItemAccessError', async () => {
      const site = loggedInSite().get(RESERVATIONS_URL, html('Niet gevonden', 404));

      await assert.rejects(createClient(site).getReservations('123456'), ItemAccessError);
    });
  });

  describe('getAllInfo', () => {
    it('only opens pages for confirmed non-zero counts', async () => {
      const site = loggedInSite()
        .get(`${BASE}/api/my-library/memberships`, json(MEMBERSHIPS))
        .get(`${BASE}/api/my-library/123456/activities`, json({ numberOfLoans: 1, numberOfHolds: 0 }))
        .get(LOANS_URL, html(fixture('loans-checkbox.html')));

      const info = await createClient(site).getAllInfo();

      assert.deepEqual(Object.keys(info).sort(), ['123456', '7890']);
      assert.equal(info['123456'].loans.length, 1);
      assert.equal(info['123456'].loans[0].title, 'Een willekeurige boektitel');
      assert.deepEqual(info['123456'].reservations, []);
      assert.deepEqual(info['7890'].loans, []);
      assert.deepEqual(info['7890'].reservations, []);
      assert.equal(site.requestsTo(RESERVATIONS_URL).length, 0);
      assert.equal(site.requestsTo(`${BASE}/mijn-bibliotheek/lidmaatschappen/7890/uitleningen`).length, 0);
    });
  });

  describe('extendLoans', () => {
    it('only simulates by default', async () => {
      const site = loggedInSite();

      const result = await createClient(site).extendLoans(EXTEND_URL);

      assert.deepEqual(result, { success: false, simulated: true, loans: null, details: null });
      assert.equal(site.requestsTo(EXTEND_URL).length, 0);
    });

    it('extends with the loans page as referer', async () => {
      const site = loggedInSite()
        .get(EXTEND_URL, html(fixture('extend-success.html')))
        .get(LOANS_URL, html(fixture('loans-extendable.html')));
      const client = createClient(site);

      const result = await client.extendLoans(EXTEND_URL, true);
      await client.getLoans('123456');

      assert.deepEqual(result, {
        success: true,
        simulated: false,
        loans: [],
        details: { likelySuccess: true, count: 1, details: [{ title: 'Het schip der doden', until: '2024-01-08' }] }
      });
      assert.equal(site.requestsTo(EXTEND_URL)[0].headers.get('referer'), LOANS_URL);
      assert.equal(site.requestsTo(LOANS_URL)[0].headers.get('referer'), null);
    });

    it('counts a 200 without status messages as success', async () => {
      const site = loggedInSite().get(EXTEND_URL, html('<html><body>Mijn uitleningen</body></html>'));

      const result = await createClient(site).extendLoans(EXTEND_URL, true);

      assert.equal(result.success, true);
      assert.equal(result.simulated, false);
      assert.equal(result.details, null);
    });

    it('is not successful when the site reports a failure', async () => {
      const script = String.raw`[{"command":"insert","data":"\u003Cdiv aria-label=\u0022Foutmelding\u0022\u003E\u003Cul class=\u0022messages__list\u0022\u003E\u003Cli\u003EEr ging iets fout bij het verlengen van deze uitleningen:\u003C\/li\u003E\u003C\/ul\u003E\u003C\/div\u003E","settings":null}]`;
      const site = loggedInSite().get(
        EXTEND_URL,
        html(`<html><body><script type="application/vnd.drupal-ajax">${script}</script></body></html>`)
      );

      const result = await createClient(site).extendLoans(EXTEND_URL, true);

      assert.equal(result.success, false);
      assert.equal(result.simulated, false);
      assert.deepEqual(result.details, { likelySuccess: false, count: 0, details: [] });
    });

    it('raises ExtendLoanError on a server crash', async () => {
      const site = loggedInSite().get(EXTEND_URL, html('Internal Server Error', 500));

      await assert.rejects(createClient(site).extendLoans(EXTEND_URL, true), {
        name: 'ExtendLoanError',
        message: `Could not extend loans using url: ${EXTEND_URL}`
      });
    });

    it('raises ExtendLoanError on other failing statuses', async () => {
      const site = loggedInSite().get(EXTEND_URL, html('Niet gevonden', 404));

      await assert.rejects(createClient(site).extendLoans(EXTEND_URL, true), ExtendLoanError);
    });

    it('rejects urls that are not extend urls', async () => {
      const client = createClient(loggedInSite());

      await assert.rejects(
        client.extendLoans(`${BASE}/mijn-bibliotheek/lidmaatschappen/123456/uitleningen`),
        InvalidExtendLoanUrlError
      );
      await assert.rejects(
        client.extendLoans(`${BASE}/mijn-bibliotheek/lidmaatschappen/123456/uitleningen/verlengen`),
        InvalidExtendLoanUrlError
      );
      await assert.rejects(
        client.extendLoans(`${BASE}/mijn-bibliotheek/lidmaatschappen/%E0/uitleningen/verlengen?loan-ids=5`, true),
        InvalidExtendLoanUrlError
      );
    });
  });

  describe('extendLoansByIds', () => {
    it('builds the extend url from account and extend ids', async () => {
      const url = `${BASE}/mijn-bibliotheek/lidmaatschappen/123456/uitleningen/verlengen?loan-ids=123456%7C6207416%2C123456%7C6207417`;
      const site = loggedInSite().get(url, html(fixture('extend-success.html')));

      const result = await createClient(site).extendLoansByIds(
        [
          ['123456', '6207416'],
          ['123456', '6207417']
        ],
        true
      );

      assert.equal(result.success, true);
      assert.equal(site.requestsTo(url).length, 1);
    });

    it('rejects an empty list', async () => {
      await assert.rejects(createClient(loggedInSite()).extendLoansByIds([]), RangeError);
    });
  });
});

describe('buildBaseUrl', () => {
  it('uses the city subdomain when given', () => {
    assert.equal(buildBaseUrl('Gent'), 'https://gent.bibliotheek.be');
    assert.equal(buildBaseUrl(), 'https://bibliotheek.be');
    assert.equal(buildBaseUrl(' '), 'https://bibliotheek.be');
  });
});

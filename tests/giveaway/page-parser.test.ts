import { InvalidResponseError } from '../../src/shared/errors.js';
import { parseGiveawayPage, readEntryCount } from '../../src/giveaway/page-parser.js';
import { isRunning, maxEntriesPerAccount, giveawayUrl } from '../../src/giveaway/giveaway.js';
import { DEFAULT_CAMPAIGN, giveawayPage } from '../helpers/pages.js';

const NOW = 1_700_100_000;

describe('readEntryCount', () => {
  it('reads the counter argument', () => {
    expect(readEntryCount("<i ng-init='initEntryCount(1234)'>")).toBe(1234);
    expect(readEntryCount('initEntryCount(0)')).toBe(0);
  });

  it('returns null when the counter is absent or not an unsigned integer', () => {
    expect(readEntryCount('<html></html>')).toBeNull();
    expect(readEntryCount('initEntryCount()')).toBeNull();
    expect(readEntryCount('initEntryCount(-3)')).toBeNull();
    expect(readEntryCount('initEntryCount(12 )')).toBeNull();
    expect(readEntryCount('initEntryCount(1e3)')).toBeNull();
  });
});

describe('parseGiveawayPage', () => {
  it('builds a complete record from a widget page', () => {
    const giveaway = parseGiveawayPage('lSq1Q', giveawayPage(DEFAULT_CAMPAIGN, '87'), NOW);

    expect(giveaway).toEqual({
      id: 'lSq1Q',
      name: 'Win a Mechanical Keyboard',
      description: 'One lucky winner',
      entryCount: 87,
      entryMethods: [
        { kind: 'twitter_follow', worth: 1 },
        { kind: 'visit_url', worth: 3 },
      ],
      startDate: 1_700_000_000,
      endDate: 1_700_600_000,
      lastFetchedAt: NOW,
    });
  });

  it('decodes widget text with the HTML decoder', () => {
    const body = giveawayPage({
      ...DEFAULT_CAMPAIGN,
      name: 'Bob&#39;s <em>giveaway</em>',
      description: '<p>Win</p>\u00a0It&#39;s free',
    });
    const giveaway = parseGiveawayPage('2zAsX', body, NOW);

    expect(giveaway.name).toBe("Bob's giveaway");
    expect(giveaway.description).toBe("Win\nIt's free");
  });

  it('decodes script text with the script decoder', () => {
    const body = [
      '{"campaign":{"name":"Win \\u003cb\\u003eBig\\u003c/b\\u003e",',
      '"starts_at":10,"ends_at":20},',
      '"incentive":{"description":"Bob\\u0026#39;s prize \\u0026#127873;"},',
      '"entry_methods":[]}',
      'initEntryCount(5)',
    ].join('');
    const giveaway = parseGiveawayPage('7qHd6', body, NOW);

    expect(giveaway.name).toBe('Win Big');
    expect(giveaway.description).toBe("Bob's prize \u{1F381}");
    expect(giveaway.entryCount).toBe(5);
    expect(giveaway.entryMethods).toEqual([]);
  });

  it('keeps a missing counter as null', () => {
    expect(parseGiveawayPage('3uSs9', giveawayPage(), NOW).entryCount).toBeNull();
  });

  it('throws instead of returning a partial record', () => {
    expect(() => parseGiveawayPage('3uSs9', '<html>gone</html>', NOW)).toThrow(
      InvalidResponseError,
    );
  });
});

describe('giveaway helpers', () => {
  const giveaway = parseGiveawayPage('OWMw8', giveawayPage(), NOW);

  it('rebuilds the canonical URL from the id', () => {
    expect(giveawayUrl(giveaway)).toBe('https://gleam.io/OWMw8/-');
  });

  it('is running until the end date', () => {
    expect(isRunning(giveaway, 1_700_599_999)).toBe(true);
    expect(isRunning(giveaway, 1_700_600_000)).toBe(false);
  });

  it('sums entry method worth', () => {
    expect(maxEntriesPerAccount(giveaway)).toBe(4);
  });
});

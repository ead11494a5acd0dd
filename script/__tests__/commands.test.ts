import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestStore, KESAVANANDA, MARBURY, type TestStore } from '../../server/__tests__/helpers';
import { SAMPLE_PRECEDENTS } from '../../server/seed';
import { USAGE, runManage } from '../commands';

describe('manage commands', () => {
  let store: TestStore;
  let output: string[];

  const run = async (...argv: string[]) => {
    output = [];
    await runManage(argv, store.storage, (line) => output.push(line));
    return output;
  };

  const addMarbury = () =>
    run(
      'add',
      '--title', MARBURY.title,
      '--case-number', MARBURY.caseNumber,
      '--year', String(MARBURY.year),
      '--court', MARBURY.court,
      '--description', MARBURY.description,
      '--keywords', MARBURY.keywords ?? '',
    );

  beforeEach(async () => {
    store = await createTestStore();
  });

  afterEach(() => {
    store.database.close();
  });

  describe('add', () => {
    it('adds a precedent', async () => {
      expect(await addMarbury()).toEqual(['✓ Successfully added precedent: Marbury v. Madison']);
      expect(await store.storage.countPrecedents()).toBe(1);
    });

    it('reports missing options', async () => {
      expect(await run('add', '--title', 'X v. Y', '--case-number', '1', '--year', '2000')).toEqual([
        '✗ Missing required options: --court, --description',
      ]);
    });

    it('reports a non-integer year', async () => {
      const lines = await run(
        'add', '--title', 'X v. Y', '--case-number', '1', '--year', 'MMXX',
        '--court', 'High Court', '--description', 'Test',
      );
      expect(lines).toEqual(['✗ Error adding precedent: Year must be an integer']);
      expect(await store.storage.countPrecedents()).toBe(0);
    });

    it('reports a duplicate title', async () => {
      await addMarbury();
      expect(await addMarbury()).toEqual([
        '✗ Error adding precedent: UNIQUE constraint failed: precedents.title',
      ]);
      expect(await store.storage.countPrecedents()).toBe(1);
    });

    it('reports unknown options', async () => {
      const [line] = await run('add', '--bogus', 'x');
      expect(line).toMatch(/^✗ Unknown option '--bogus'/);
    });
  });

  describe('list', () => {
    it('reports an empty database', async () => {
      expect(await run('list')).toEqual(['No precedents found in database.']);
    });

    it('prints a fixed-width table', async () => {
      await store.storage.createPrecedent(MARBURY);
      await store.storage.createPrecedent(KESAVANANDA);

      expect(await run('list')).toEqual([
        '',
        'ID    Title                          Year   Court               ',
        '-----------------------------------------------------------------',
        '1     Marbury v. Madison             1803   Supreme Court       ',
        '2     Kesavananda Bharati v. Stat... 1973   Supreme Court of India',
        '',
        'Total: 2 precedents',
      ]);
    });
  });

  describe('delete', () => {
    it('deletes by id', async () => {
      const created = await store.storage.createPrecedent(MARBURY);
      expect(await run('delete', String(created.id))).toEqual(['✓ Successfully deleted precedent: Marbury v. Madison']);
      expect(await store.storage.countPrecedents()).toBe(0);
    });

    it('reports a missing id', async () => {
      expect(await run('delete', '42')).toEqual(['✗ Precedent with ID 42 not found.']);
    });

    it('reports an invalid id', async () => {
      expect(await run('delete', 'abc')).toEqual(['✗ Invalid precedent ID: abc']);
    });
  });

  describe('search', () => {
    it('prints each match', async () => {
      await store.storage.createPrecedent(MARBURY);
      await store.storage.createPrecedent(KESAVANANDA);

      expect(await run('search', 'judicial')).toEqual([
        '',
        "Found 1 result(s) for 'judicial':",
        '',
        'Title: Marbury v. Madison',
        'Case #: 1803-SC-001',
        'Year: 1803',
        'Court: Supreme Court',
        'Description: Established judicial review in the United States....',
        'Keywords: judicial review, constitutional law',
        '-'.repeat(60),
      ]);
    });

    it('reports no results', async () => {
      expect(await run('search', 'nothing', 'here')).toEqual(['No results found for: nothing here']);
    });

    it('rejects a short query', async () => {
      expect(await run('search', 'x')).toEqual(['✗ Search query must be at least 2 characters']);
    });
  });

  it('seeds an empty database once', async () => {
    expect(await run('seed')).toEqual([`✓ Database initialized with ${SAMPLE_PRECEDENTS.length} sample precedents.`]);
    expect(await run('seed')).toEqual(['Database already contains precedents; nothing to seed.']);
  });

  it('prints usage for an unknown command', async () => {
    expect(await run()).toEqual([USAGE]);
    expect(await run('frobnicate')).toEqual([USAGE]);
  });
});

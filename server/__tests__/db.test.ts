import { afterEach, describe, expect, it, vi } from 'vitest';
import { precedents } from '@shared/schema';
import { openDatabase, type DatabaseHandle } from '../db';

describe('openDatabase', () => {
  let database: DatabaseHandle | undefined;

  afterEach(() => {
    database?.close();
    database = undefined;
    vi.restoreAllMocks();
  });

  it('echoes SQL statements when query logging is on', () => {
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
    database = openDatabase(':memory:', { logQueries: true });

    database.db.select().from(precedents).all();

    expect(consoleLog).toHaveBeenCalledWith(expect.stringMatching(/^Query: select .* from "precedents"/));
  });

  it('stays quiet by default', () => {
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
    database = openDatabase(':memory:');

    database.db.select().from(precedents).all();

    expect(consoleLog).not.toHaveBeenCalled();
  });
});

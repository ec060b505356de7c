import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';

import { describe, it, expect, beforeAll, afterAll } from 'vitest';

import { CsvEventSource, parseCsvTable } from '../csv-source.js';
import { loadEvents } from '../load-events.js';

const HEADER = 'Test_ID,test_name,owner,platform,team,pipeline,occurred_at,failure_reason,app_version,ticket_url';

describe('parseCsvTable', () => {
  it('should lower-case the header and map empty cells to null', () => {
    const table = parseCsvTable(`${HEADER}\nT1,"login, happy path",qa,ios,mobile,nightly,2024-01-01T10:00:00Z,,1.0,\n`);

    expect(table.columns).toEqual([
      'test_id',
      'test_name',
      'owner',
      'platform',
      'team',
      'pipeline',
      'occurred_at',
      'failure_reason',
      'app_version',
      'ticket_url',
    ]);
    expect(table.rows).toEqual([
      {
        test_id: 'T1',
        test_name: 'login, happy path',
        owner: 'qa',
        platform: 'ios',
        team: 'mobile',
        pipeline: 'nightly',
        occurred_at: '2024-01-01T10:00:00Z',
        failure_reason: null,
        app_version: '1.0',
        ticket_url: null,
      },
    ]);
  });

  it('should strip a byte order mark and skip blank lines', () => {
    const table = parseCsvTable(`\uFEFF${HEADER}\n\nT1,a,qa,ios,mobile,nightly,2024-01-01T10:00:00Z,timeout,,\n\n`);

    expect(table.columns[0]).toBe('test_id');
    expect(table.rows).toHaveLength(1);
  });

  it('should tolerate short rows', () => {
    const table = parseCsvTable(`${HEADER}\nT1,a,qa,ios,mobile,nightly,2024-01-01T10:00:00Z,timeout\n`);

    expect(table.rows[0]?.app_version).toBeNull();
    expect(table.rows[0]?.ticket_url).toBeNull();
  });
});

describe('CsvEventSource', () => {
  let dir: string;
  let file: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'flakelens-csv-'));
    file = path.join(dir, 'events.csv');
    await writeFile(
      file,
      [
        HEADER,
        'T1,login,qa,ios,mobile,nightly,2024-01-01T10:00:00Z,timeout,1.0,',
        'T2,checkout,qa,android,mobile,pr,2024-01-02T10:00:00Z,network,1.0,https://tracker.example.com/FLK-2',
      ].join('\n')
    );
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should identify itself by absolute path', () => {
    expect(new CsvEventSource(file).id).toBe(`csv:${path.resolve(file)}`);
  });

  it('should load events from the file', async () => {
    const events = await loadEvents(new CsvEventSource(file));

    expect(events.map((event) => event.testId)).toEqual(['T1', 'T2']);
    expect(events[1]?.ticketUrl).toBe('https://tracker.example.com/FLK-2');
    expect(events[0]?.appVersion).toBe('1.0');
  });
});

import assert from 'node:assert/strict';
import test from 'node:test';

import { QUEUE_TYPES } from '../fax/types';
import { listingFor, parseStatusLine, parseStatusListing } from './formats';

test('every queue maps to a directory and a format command', () => {
  const listings = QUEUE_TYPES.map((queue) => [queue, listingFor(queue).directory, listingFor(queue).formatCommand]);
  assert.deepEqual(listings, [
    ['send', 'sendq', 'JOBFMT'],
    ['done', 'doneq', 'JOBFMT'],
    ['received', 'recvq', 'RCVFMT'],
    ['archive', 'archive', 'JOBFMT'],
    ['document', 'docq', 'FILEFMT'],
    ['server-status', 'status', 'MDMFMT'],
  ]);
});

test('job formats emit one directive per field', () => {
  const layout = listingFor('send');
  assert.equal(layout.format, '%j|%a|%P|%D|%Y|%o|%e|%m|%J|%s');
  assert.equal(layout.format.split('|').length, layout.fields.length);
});

test('a job line decodes into named fields', () => {
  const record = parseStatusLine('12|S|0:2|1:12|14:05|alice|5551000|ttyS0|invoice|Busy signal', listingFor('send'));
  assert.deepEqual(record, {
    jobId: '12',
    state: 'S',
    pages: '0:2',
    dials: '1:12',
    timeToSend: '14:05',
    sender: 'alice',
    number: '5551000',
    modem: 'ttyS0',
    tag: 'invoice',
    status: 'Busy signal',
  });
});

test('the status field keeps embedded separators', () => {
  const record = parseStatusLine('7|F|0:1|3:3||bob|5552000|any||No carrier | retrying', listingFor('done'));
  assert.equal(record?.status, 'No carrier | retrying');
  assert.equal(record?.timeToSend, undefined);
});

test('lines without the identity field are skipped', () => {
  assert.equal(parseStatusLine('|P|0:1', listingFor('send')), null);
});

test('a listing decodes every record line and ignores blanks', () => {
  const listing = 'fax00001.tif|3|+15551234567|2024-05-01 10:00|\r\n\r\nfax00002.tif|1|Acme Corp|2024-05-02 09:30|Page too short\r\n';
  assert.deepEqual(parseStatusListing(listing, listingFor('received')), [
    { fileName: 'fax00001.tif', pages: '3', sender: '+15551234567', received: '2024-05-01 10:00' },
    {
      fileName: 'fax00002.tif',
      pages: '1',
      sender: 'Acme Corp',
      received: '2024-05-02 09:30',
      status: 'Page too short',
    },
  ]);
});

test('modem status lines are keyed by modem', () => {
  assert.deepEqual(parseStatusListing('ttyS0|+15550000000|Running and idle\n', listingFor('server-status')), [
    { modem: 'ttyS0', number: '+15550000000', status: 'Running and idle' },
  ]);
});

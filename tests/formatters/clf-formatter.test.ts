import { describe, test, expect } from 'vitest';
import { Chalk } from 'chalk';
import { ClfFormatter } from '../../src/formatters/clf-formatter';
import type { LineRecord } from '../../src/core/types';

const record: LineRecord = {
  client: '127.0.0.1',
  userIdentifier: '-',
  userid: 'frank',
  datetime: '[10/Oct/2000:13:55:36 -0700]',
  method: 'GET',
  request: '/apache_pb.gif',
  protocol: 'HTTP/1.0',
  status: '200',
  size: '2326',
};

describe('ClfFormatter', () => {
  test('rebuilds the line with literal punctuation', () => {
    const formatter = new ClfFormatter(new Chalk({ level: 0 }));

    expect(formatter.format(record)).toBe(
      '127.0.0.1 - frank [10/Oct/2000:13:55:36 -0700] "GET /apache_pb.gif HTTP/1.0" 200 2326'
    );
  });

  test('wraps each field in its own style', () => {
    const formatter = new ClfFormatter(new Chalk({ level: 1 }));

    expect(formatter.format(record)).toBe(
      [
        '\u001b[91m127.0.0.1\u001b[39m',
        '\u001b[37m-\u001b[39m',
        '\u001b[37m\u001b[1mfrank\u001b[22m\u001b[39m',
        '\u001b[95m[10/Oct/2000:13:55:36 -0700]\u001b[39m',
        '"\u001b[96mGET\u001b[39m \u001b[36m/apache_pb.gif\u001b[39m \u001b[36mHTTP/1.0\u001b[39m"',
        '\u001b[93m200\u001b[39m',
        '\u001b[92m2326\u001b[39m',
      ].join(' ')
    );
  });
});

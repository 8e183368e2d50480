import chalk, { type ChalkInstance } from 'chalk';
import type { LineRecord } from '../core/types.ts';
import type { Formatter } from './formatter.interface.ts';

/**
 * CLF 紀錄格式化：每個欄位各自上色，引號與空白不上色
 */
export class ClfFormatter implements Formatter<LineRecord> {
  private readonly colors: ChalkInstance;

  constructor(colors: ChalkInstance = chalk) {
    this.colors = colors;
  }

  format(record: LineRecord): string {
    const c = this.colors;
    const request = `"${c.cyanBright(record.method)} ${c.cyan(record.request)} ${c.cyan(record.protocol)}"`;

    return [
      c.redBright(record.client),
      c.white(record.userIdentifier),
      c.white.bold(record.userid),
      c.magentaBright(record.datetime),
      request,
      c.yellowBright(record.status),
      c.greenBright(record.size),
    ].join(' ');
  }
}

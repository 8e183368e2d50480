import type { LineRecord } from '../core/types.ts';

/**
 * Common Log Format:
 * client user_identifier userid [datetime] "METHOD request protocol" status size
 */
const CLF_PATTERN = new RegExp(
  [
    String.raw`(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})`, // client
    String.raw`(\S+)`, // user_identifier
    String.raw`(\S+)`, // userid
    String.raw`(\[.*?\])`, // datetime
    String.raw`"([A-Z]+)\s(\S+)\s(\S+)"`, // method, request, protocol
    String.raw`(\d{3})`, // status
    String.raw`(\d+|-)`, // size
  ].join(String.raw`\s`),
  'g'
);

/**
 * CLF 解析器 - 以不重疊的重複搜尋擷取一行中所有符合的紀錄
 */
export class ClfParser {
  /**
   * 不符合語法的行回傳空陣列（不視為錯誤）
   */
  parse(line: string): LineRecord[] {
    if (!line) return [];

    const records: LineRecord[] = [];
    for (const match of line.matchAll(CLF_PATTERN)) {
      // 九個群組皆為必填，預設值只為了型別
      const [
        ,
        client = '',
        userIdentifier = '',
        userid = '',
        datetime = '',
        method = '',
        request = '',
        protocol = '',
        status = '',
        size = '',
      ] = match;
      records.push({ client, userIdentifier, userid, datetime, method, request, protocol, status, size });
    }
    return records;
  }
}

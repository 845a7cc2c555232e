/**
 * Task log that keeps its lines.
 */

import { Logger, logger as rootLogger } from '../logger';
import { TaskLog } from '../domain/toolchain';

/** Collects the lines of one operation and mirrors each to the logger at debug level. */
export class BufferedTaskLog implements TaskLog {
  private collected: string[] = [];

  constructor(private logger: Logger = rootLogger.child({ source: 'task-log' })) {}

  println(line: string): void {
    this.collected.push(line);
    this.logger.debug(line);
  }

  get lines(): readonly string[] {
    return [...this.collected];
  }
}

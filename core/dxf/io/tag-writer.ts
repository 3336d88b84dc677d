import { MalformedValueError } from '../../errors/types';
import { DxfTag } from '../types';
import { formatGroupCode } from '../group-codes';
import { LineSink } from './line-sink';

const LINE_BREAK = /[\r\n]/;

export function formatTag(tag: DxfTag): string {
  if (LINE_BREAK.test(tag.value)) {
    throw new MalformedValueError(`Value for group code ${tag.code} contains a line break`, tag.value, {
      groupCode: tag.code
    });
  }
  return `${formatGroupCode(tag.code)}\n${tag.value}\n`;
}

/**
 * Format every tag before anything is written
 */
export function formatTags(tags: readonly DxfTag[]): string {
  return tags.map(formatTag).join('');
}

/**
 * Buffer-then-flush: one sink write per call, nothing written when formatting fails
 */
export function writeTags(sink: LineSink, tags: readonly DxfTag[]): void {
  sink.write(formatTags(tags));
}

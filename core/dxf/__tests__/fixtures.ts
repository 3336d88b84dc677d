import { ILogger } from '../../logging/ILogger';
import { StringLineSource } from '../io/line-source';
import { TagReader } from '../io/tag-reader';
import { DxfVersion, VersionContext } from '../version';

export type TagPair = [number, string];

/**
 * Render pairs the way a conformant writer lays them out
 */
export function tagText(pairs: TagPair[]): string {
  return pairs.map(([code, value]) => `${String(code).padStart(3, ' ')}\n${value}\n`).join('');
}

export function readerFor(pairs: TagPair[], name = 'fixture.dxf'): TagReader {
  return new TagReader(new StringLineSource(tagText(pairs), name));
}

export function contextFor(version: DxfVersion, overrides: Partial<VersionContext> = {}): VersionContext {
  return { version, strict: false, largeGraphicsDataSize: false, ...overrides };
}

/**
 * Logger double that records every call
 */
export function createMockLogger(): jest.Mocked<ILogger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn()
  };
}

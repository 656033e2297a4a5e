import { describe, expect, it } from 'vitest';
import { extractKeywords, stripFlagTokens } from '../keywords.js';

describe('extractKeywords', () => {
  it('keeps identifiers and technology names in first-seen order', () => {
    expect(extractKeywords('Implemented full OAuth2 flow')).toEqual(['oauth', 'flow', 'oauth2']);
  });

  it('drops stop words and a leading changelog category', () => {
    expect(extractKeywords('Added Bybit exchange support with WebSocket streaming')).toEqual([
      'bybit',
      'exchange',
      'websocket',
      'streaming',
    ]);
  });

  it('ignores command-line flags', () => {
    expect(extractKeywords('Support --verbose output for exports')).toEqual(['output', 'exports']);
  });

  it('keeps quoted names but not quoted flags', () => {
    expect(extractKeywords('Added `--dry-run` flag to the "release" command')).toEqual(['flag', 'command', 'release']);
  });

  it('extracts snake_case identifiers whole', () => {
    expect(extractKeywords('Fixed parse_tag_range edge case')).toEqual(['parse_tag_range', 'edge', 'case']);
  });
});

describe('stripFlagTokens', () => {
  it('removes short and long flags', () => {
    expect(stripFlagTokens('run -v --dry-run now').split(/\s+/)).toEqual(['run', 'now']);
  });
});

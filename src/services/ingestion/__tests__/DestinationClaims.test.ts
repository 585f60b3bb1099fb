import { describe, it, expect } from 'vitest';
import { claimDestinations } from '../DestinationClaims.js';
import type { SourceFile } from '../../../domain/entities/SourceFile.js';

const file = (relativePath: string): SourceFile => ({
  absolutePath: `/src/${relativePath}`,
  relativePath,
  kind: relativePath.endsWith('.pdf') ? 'pdf' : 'text',
});

describe('claimDestinations', () => {
  it('gives each destination to the first source and rejects the rest', () => {
    const sources = [file('news/x.pdf'), file('news/x.txt'), file('news/y.txt'), file('news/undated.txt')];
    const destinations: Record<string, string | null> = {
      'news/x.pdf': '/out/news/2020-01-01_x.txt',
      'news/x.txt': '/out/news/2020-01-01_x.txt',
      'news/y.txt': '/out/news/2020-01-01_y.txt',
      'news/undated.txt': null,
    };

    const claims = claimDestinations(sources, source => destinations[source.relativePath] ?? null);

    expect(claims.runnable.map(source => source.relativePath)).toEqual(['news/x.pdf', 'news/y.txt', 'news/undated.txt']);
    expect(claims.collisions).toEqual([
      {
        status: 'rejected',
        source: file('news/x.txt'),
        reason: 'error:destination collision with news/x.pdf',
        detail: 'destination collision with news/x.pdf',
      },
    ]);
  });
});

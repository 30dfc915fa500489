import { describe, it, expect } from 'vitest';
import { JobClassifier } from '../classifier.js';
import type { ClassificationOracle } from '../../llm/oracle.js';
import { LlmError, LlmUnavailableError } from '../../shared/errors.js';
import { createRecord } from '../../record/record.js';

class MockOracle implements ClassificationOracle {
  readonly name = 'mock';
  readonly calls: Array<{ text: string; instructions: string }> = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async classify(text: string, instructions: string): Promise<string> {
    this.calls.push({ text, instructions });
    const next = this.replies.shift();
    if (next === undefined) throw new Error('MockOracle ran out of replies');
    if (next instanceof Error) throw next;
    return next;
  }
}

function metadataReply(value: Record<string, unknown>): string {
  return JSON.stringify(value);
}

describe('JobClassifier.isRealJob', () => {
  it('accepts YES in any case and position', async () => {
    expect(await new JobClassifier(new MockOracle(['YES'])).isRealJob('PhD position in Biology')).toBe(true);
    expect(await new JobClassifier(new MockOracle(['yes'])).isRealJob('PhD position')).toBe(true);
    expect(await new JobClassifier(new MockOracle(['YES, this is a real job posting'])).isRealJob('x')).toBe(true);
  });

  it('rejects NO', async () => {
    expect(await new JobClassifier(new MockOracle(['NO'])).isRealJob('I hate job searching')).toBe(false);
  });
});

describe('JobClassifier.getMetadata', () => {
  async function metadata(reply: string) {
    return new JobClassifier(new MockOracle([reply])).getMetadata('post');
  }

  it('parses a single position', async () => {
    const result = await metadata(
      metadataReply({ disciplines: ['Biology'], country: 'UK', position_type: ['PhD Student'] }),
    );
    expect(result).toEqual({ disciplines: ['Biology'], country: 'UK', position_type: ['PhD Student'] });
  });

  it('keeps multiple position types', async () => {
    const result = await metadata(
      metadataReply({ disciplines: ['Physics'], country: 'USA', position_type: ['PhD Student', 'Postdoc'] }),
    );
    expect(result.position_type).toEqual(['PhD Student', 'Postdoc']);
  });

  it('coerces a string position type to a list', async () => {
    const result = await metadata(
      metadataReply({ disciplines: ['Biology'], country: 'UK', position_type: 'PhD Student' }),
    );
    expect(result.position_type).toEqual(['PhD Student']);
  });

  it('caps disciplines at three', async () => {
    const result = await metadata(
      metadataReply({
        disciplines: ['Biology', 'Chemistry & Materials Science', 'Medicine', 'Physics'],
        country: 'UK',
        position_type: ['PhD Student'],
      }),
    );
    expect(result.disciplines).toEqual(['Biology', 'Chemistry & Materials Science', 'Medicine']);
  });

  it('falls back to defaults on invalid or empty replies', async () => {
    const expected = { disciplines: ['Other'], country: 'Unknown', position_type: ['PhD Student'] };
    expect(await metadata('This is not valid JSON')).toEqual(expected);
    expect(await metadata('')).toEqual(expected);
  });

  it('accepts fenced JSON', async () => {
    const reply =
      '```json\n' +
      metadataReply({ disciplines: ['Physics'], country: 'Switzerland', position_type: ['Postdoc'] }) +
      '\n```';
    expect(await metadata(reply)).toEqual({
      disciplines: ['Physics'],
      country: 'Switzerland',
      position_type: ['Postdoc'],
    });
  });

  it('fuzzy-matches position types', async () => {
    const result = await metadata(
      metadataReply({ disciplines: ['Biology'], country: 'USA', position_type: ['PhD Student position'] }),
    );
    expect(result.position_type).toEqual(['PhD Student']);
  });

  it('maps unknown disciplines to Other', async () => {
    const result = await metadata(
      metadataReply({ disciplines: ['Underwater Basket Weaving'], country: 'Unknown', position_type: ['PhD Student'] }),
    );
    expect(result.disciplines).toEqual(['Other']);
  });

  it('keeps General call', async () => {
    const result = await metadata(
      metadataReply({ disciplines: ['General call'], country: 'Netherlands', position_type: ['PhD Student', 'Postdoc'] }),
    );
    expect(result.disciplines).toEqual(['General call']);
    expect(result.position_type).toEqual(['PhD Student', 'Postdoc']);
  });

  it('removes duplicates', async () => {
    const result = await metadata(
      metadataReply({ disciplines: ['Biology', 'Biology'], country: 'UK', position_type: ['Postdoc', 'Postdoc'] }),
    );
    expect(result.disciplines).toEqual(['Biology']);
    expect(result.position_type).toEqual(['Postdoc']);
  });
});

describe('JobClassifier.classifyPost', () => {
  it('returns metadata for jobs', async () => {
    const oracle = new MockOracle([
      'YES',
      metadataReply({ disciplines: ['Biology'], country: 'Norway', position_type: ['Postdoc'] }),
    ]);
    const result = await new JobClassifier(oracle).classifyPost('Postdoc in fjord ecology');
    expect(result).toEqual({
      is_verified_job: true,
      disciplines: ['Biology'],
      country: 'Norway',
      position_type: ['Postdoc'],
    });
    expect(oracle.calls).toHaveLength(2);
  });

  it('skips metadata for non-jobs', async () => {
    const oracle = new MockOracle(['NO']);
    const result = await new JobClassifier(oracle).classifyPost('Finally defended my thesis!');
    expect(result).toEqual({ is_verified_job: false, country: null, disciplines: [], position_type: [] });
    expect(oracle.calls).toHaveLength(1);
  });

  it('leaves the record unknown on a non-fatal oracle error', async () => {
    const result = await new JobClassifier(new MockOracle([new LlmError('boom')])).classifyPost('x');
    expect(result.is_verified_job).toBeNull();
  });

  it('propagates oracle unavailability', async () => {
    const classifier = new JobClassifier(new MockOracle([new LlmUnavailableError('down')]));
    await expect(classifier.classifyPost('x')).rejects.toBeInstanceOf(LlmUnavailableError);
  });
});

describe('JobClassifier.classifyRecord', () => {
  it('classifies on the supplied text and keeps identity fields', async () => {
    const oracle = new MockOracle([
      'YES',
      metadataReply({ disciplines: ['Mathematics'], country: 'France', position_type: ['PhD Student'] }),
    ]);
    const record = createRecord({
      uri: 'at://x/1',
      message: '[Bio: Topologist]\n\nPhD in topology',
      url: 'https://bsky.app/profile/x/post/1',
      user_handle: 'x',
      created_at: '2025-02-01T00:00:00.000Z',
      source: 'bluesky',
    });
    const result = await new JobClassifier(oracle).classifyRecord(record, 'PhD in topology');
    expect(oracle.calls[0].text).toBe('PhD in topology');
    expect(oracle.calls[1].text).toBe('[Bio: Topologist]\n\nPhD in topology');
    expect(result.uri).toBe('at://x/1');
    expect(result.disciplines).toEqual(['Mathematics']);
    expect(result.is_verified_job).toBe(true);
  });
});

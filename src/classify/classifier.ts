import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { LlmError, LlmUnavailableError, errorMessage } from '../shared/errors.js';
import type { ClassificationOracle } from '../llm/oracle.js';
import { IS_JOB_PROMPT, buildMetadataPrompt } from '../llm/prompts.js';
import { parseJsonReply } from '../llm/parse.js';
import { normalizeRecord, type PostingRecord } from '../record/record.js';
import {
  MAX_DISCIPLINES,
  matchDiscipline,
  matchPositionType,
  type Discipline,
  type PositionType,
} from './taxonomy.js';

export interface JobMetadata {
  disciplines: Discipline[];
  country: string;
  position_type: PositionType[];
}

export interface Classification {
  is_verified_job: boolean | null;
  country: string | null;
  disciplines: Discipline[];
  position_type: PositionType[];
}

const StringOrList = z.union([z.array(z.string()), z.string()]);

// Models are sloppy about shapes; accept a bare string where a list is expected.
const MetadataReplySchema = z.object({
  disciplines: StringOrList.optional(),
  country: z.string().nullable().optional(),
  position_type: StringOrList.optional(),
});

export function defaultMetadata(): JobMetadata {
  return { disciplines: ['Other'], country: 'Unknown', position_type: ['PhD Student'] };
}

function toList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function unique<T>(values: T[]): T[] {
  return [...new Set(values)];
}

const UNCLASSIFIED: Classification = {
  is_verified_job: null,
  country: null,
  disciplines: [],
  position_type: [],
};

export class JobClassifier {
  constructor(private readonly oracle: ClassificationOracle) {}

  async isRealJob(text: string): Promise<boolean> {
    const reply = await this.oracle.classify(text, IS_JOB_PROMPT);
    return reply.toUpperCase().includes('YES');
  }

  async getMetadata(text: string): Promise<JobMetadata> {
    const reply = await this.oracle.classify(text, buildMetadataPrompt());
    const parsed = parseJsonReply(MetadataReplySchema, reply);
    if (!parsed) {
      logger.debug({ reply: reply.slice(0, 200) }, 'Unparseable metadata reply, using defaults');
      return defaultMetadata();
    }

    const disciplines = unique(
      toList(parsed.disciplines).map((d) => matchDiscipline(d) ?? 'Other'),
    ).slice(0, MAX_DISCIPLINES);

    const positionTypes = unique(
      toList(parsed.position_type)
        .map((p) => matchPositionType(p))
        .filter((p): p is PositionType => p !== null),
    );

    const country = parsed.country?.trim();
    const defaults = defaultMetadata();

    return {
      disciplines: disciplines.length > 0 ? disciplines : defaults.disciplines,
      country: country ? country : defaults.country,
      position_type: positionTypes.length > 0 ? positionTypes : defaults.position_type,
    };
  }

  /**
   * Is-job decision followed by metadata for jobs. A failed oracle call
   * leaves the record unclassified; an unavailable oracle propagates.
   *
   * `metadataText` may carry extra context (author bio, link preview) that
   * helps discipline extraction but confuses the is-job decision.
   */
  async classifyPost(text: string, metadataText: string = text): Promise<Classification> {
    try {
      if (!(await this.isRealJob(text))) {
        return { is_verified_job: false, country: null, disciplines: [], position_type: [] };
      }
      const metadata = await this.getMetadata(metadataText);
      return { is_verified_job: true, ...metadata };
    } catch (err) {
      if (err instanceof LlmUnavailableError) throw err;
      if (err instanceof LlmError) {
        logger.warn({ error: errorMessage(err) }, 'Classification failed, leaving record unclassified');
        return { ...UNCLASSIFIED };
      }
      throw err;
    }
  }

  async classifyRecord(
    record: PostingRecord,
    text: string = record.message,
    metadataText: string = record.message,
  ): Promise<PostingRecord> {
    const classification = await this.classifyPost(text, metadataText);
    return normalizeRecord({ ...record, ...classification });
  }
}

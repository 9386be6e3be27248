import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { SEVERITIES } from './ticket-model';
import { KnowledgeBaseError } from './errors';

const kbEntrySchema = z.object({
  id: z.string().trim().min(1),
  title: z.string().min(1),
  description: z.string().default(''),
  category: z.string().min(1),
  severity: z.enum(SEVERITIES),
  symptoms: z.array(z.string().trim().min(1)).default([]),
  recommended_action: z.string().min(1),
});

const kbFileSchema = z.array(kbEntrySchema);

type KBEntryInput = z.infer<typeof kbEntrySchema>;

export interface KBEntry extends Readonly<Omit<KBEntryInput, 'symptoms'>> {
  readonly symptoms: readonly string[];
}

export interface KBMatch {
  entry: KBEntry;
  score: number;
}

/**
 * Static issue table the classifier grounds its answers on. Read-only once built.
 */
export class KnowledgeBase {
  private readonly entries: readonly KBEntry[];
  private readonly byId = new Map<string, KBEntry>();

  constructor(entries: KBEntry[]) {
    for (const entry of entries) {
      const key = normalizeId(entry.id);
      if (this.byId.has(key)) {
        throw new Error(`Duplicate knowledge base id: ${entry.id}`);
      }
      this.byId.set(key, Object.freeze({ ...entry, symptoms: Object.freeze([...entry.symptoms]) }));
    }
    this.entries = Object.freeze([...this.byId.values()]);
  }

  get size(): number {
    return this.entries.length;
  }

  list(): readonly KBEntry[] {
    return this.entries;
  }

  /**
   * Case-insensitive lookup by issue id.
   */
  get(id: string | null | undefined): KBEntry | null {
    if (!id) return null;
    return this.byId.get(normalizeId(id)) ?? null;
  }

  /**
   * Score each entry by how many of its symptoms appear in the text and
   * return the best one. Ties go to the entry listed first.
   */
  match(text: string): KBMatch | null {
    const haystack = text.toLowerCase();
    let best: KBMatch | null = null;

    for (const entry of this.entries) {
      const score = entry.symptoms.reduce(
        (acc, symptom) => acc + (haystack.includes(symptom.toLowerCase()) ? 1 : 0),
        0
      );
      if (score > 0 && (!best || score > best.score)) {
        best = { entry, score };
      }
    }

    if (best) {
      console.log(`[kb] matched ${best.entry.id} with score ${best.score}`);
    } else {
      console.log('[kb] no keyword match');
    }
    return best;
  }

  /**
   * Render entries as prompt lines for the model.
   */
  promptContext(maxEntries = 20): string {
    if (this.entries.length === 0) {
      return 'No knowledge base entries available.';
    }

    return this.entries
      .slice(0, maxEntries)
      .map((entry) => {
        const symptoms = entry.symptoms.length > 0 ? entry.symptoms.join(', ') : '(no symptoms listed)';
        return `${entry.id}: ${entry.title} | Category=${entry.category} | Symptoms=${symptoms} | Recommended Action=${entry.recommended_action}`;
      })
      .join('\n');
  }
}

function normalizeId(id: string): string {
  return id.trim().toLowerCase();
}

/**
 * Parse and validate knowledge-base JSON.
 */
export function parseKnowledgeBase(raw: unknown, source = '<inline>'): KnowledgeBase {
  const parsed = kbFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new KnowledgeBaseError(
      `Invalid knowledge base at ${source}: ${issue.path.join('.')} ${issue.message}`,
      source
    );
  }
  try {
    return new KnowledgeBase(parsed.data);
  } catch (error) {
    throw new KnowledgeBaseError(
      `Invalid knowledge base at ${source}: ${error instanceof Error ? error.message : String(error)}`,
      source,
      { cause: error }
    );
  }
}

/**
 * Load the knowledge base from disk. Called once at start-up.
 */
export async function loadKnowledgeBase(path: string): Promise<KnowledgeBase> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new KnowledgeBaseError(`Knowledge base not found at ${path}`, path, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new KnowledgeBaseError(`Knowledge base at ${path} is not valid JSON`, path, { cause: error });
  }

  const kb = parseKnowledgeBase(raw, path);
  console.log(`[kb] loaded ${kb.size} entries from ${path}`);
  return kb;
}

import { z } from 'zod';

// Category → terms, as stored in data/lexicon.json
export const LexiconSchema = z.record(z.array(z.string().min(1)));

export type Lexicon = z.infer<typeof LexiconSchema>;

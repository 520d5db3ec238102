import {readFileSync} from 'node:fs'
import {z} from 'zod'

export const actionIntentLexiconSchema = z.object({
  intentPhrases: z.array(z.string().trim().toLowerCase().min(1)).min(1),
  actionVerbs: z.array(z.string().trim().toLowerCase().min(1)).min(1)
})

export type ActionIntentLexicon = z.infer<typeof actionIntentLexiconSchema>

const LEXICON_URL = new URL('../../data/action-intent.json', import.meta.url)

let defaultLexicon: ActionIntentLexicon | undefined

export function loadActionIntentLexicon(): ActionIntentLexicon {
  if (!defaultLexicon) {
    const raw: unknown = JSON.parse(readFileSync(LEXICON_URL, 'utf8'))
    defaultLexicon = actionIntentLexiconSchema.parse(raw)
  }
  return defaultLexicon
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Flags replies that announce an action ("I'll read the stack file") without
 * issuing a tool call. Needs an intent phrase and a standalone action verb
 * anywhere in the text.
 */
export function createActionIntentDetector(lexicon: ActionIntentLexicon): (text: string) => boolean {
  const verbPatterns = lexicon.actionVerbs.map((verb) => new RegExp(`(?:^|\\s)${escapeRegExp(verb)}(?=[\\s.,]|$)`))

  return (text: string) => {
    const lower = text.toLowerCase()
    if (!lexicon.intentPhrases.some((phrase) => lower.includes(phrase))) return false
    return verbPatterns.some((pattern) => pattern.test(lower))
  }
}

let defaultDetector: ((text: string) => boolean) | undefined

export function detectActionIntent(text: string): boolean {
  defaultDetector ??= createActionIntentDetector(loadActionIntentLexicon())
  return defaultDetector(text)
}

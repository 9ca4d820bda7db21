/**
 * Dialogue prompts for the LLM-backed engine
 */

import type { DialogueContext } from '@/types/dialogue'

export const DIALOGUE_SYSTEM_PROMPT = `You are the voice of a friendly humanoid robot greeting visitors in a public space. Every reply is spoken aloud by the robot, so write only what should be said.

Conversation rules:
- Keep replies to one or two short sentences, under 40 words.
- No markdown, lists, emoji or stage directions.
- Be warm and helpful. Ask at most one question per reply.
- If the visitor says goodbye, thanks you and clearly wants to leave, or asks you to stop, reply with a short goodbye and append [END].

Gestures:
- You may add one gesture tag anywhere in the reply: [gesture:NAME]
- NAME is one of: calm, explain, greet, happy, showing_tablet, thinking
- Use a gesture only when it fits what you are saying.`

export const GREETING_CUE = '(A visitor has just walked up to you. Greet them and offer your help.)'

export const DIALOGUE_MAX_TOKENS = 150

const END_MARKER = /\[END\]/gi
const GESTURE_TAG = /\[gesture:\s*([a-z_]+)\s*\]/gi

export function buildSystemPrompt(context: DialogueContext): string {
  if (!context.emotion) return DIALOGUE_SYSTEM_PROMPT
  return `${DIALOGUE_SYSTEM_PROMPT}\n\nThe visitor currently looks ${context.emotion}. Adapt your tone to that.`
}

export interface ParsedReply {
  text: string
  gesture?: string
  endOfSession: boolean
}

/** Strips control tags from a model reply. The first gesture tag wins. */
export function parseAssistantReply(raw: string): ParsedReply {
  const endOfSession = raw.search(END_MARKER) !== -1
  let gesture: string | undefined

  const text = raw
    .replace(GESTURE_TAG, (_, name: string) => {
      gesture ??= name.toLowerCase()
      return ' '
    })
    .replace(END_MARKER, ' ')
    .replace(/\s{2,}/g, ' ')
    .trim()

  return gesture === undefined ? { text, endOfSession } : { text, gesture, endOfSession }
}

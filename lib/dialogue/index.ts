import { AnthropicDialogueEngine } from './anthropic-engine'
import { RasaDialogueEngine } from './rasa-engine'
import { ConfigError } from '@/lib/orchestrator/errors'
import type { OrchestratorConfig } from '@/types/config'
import type { DialogueEngine } from '@/types/dialogue'

export { AnthropicDialogueEngine } from './anthropic-engine'
export { RasaDialogueEngine, parseRasaReply } from './rasa-engine'
export { parseAssistantReply, buildSystemPrompt } from './dialogue-prompts'

export function createDialogueEngine(config: OrchestratorConfig): DialogueEngine {
  const { dialogue } = config
  switch (dialogue.provider) {
    case 'rasa':
      return new RasaDialogueEngine({ url: dialogue.rasaUrl })
    case 'anthropic':
      if (!dialogue.anthropicApiKey) {
        throw new ConfigError('The anthropic dialogue provider needs ANTHROPIC_API_KEY')
      }
      return new AnthropicDialogueEngine({ apiKey: dialogue.anthropicApiKey, model: dialogue.model })
  }
}

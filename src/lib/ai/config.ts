import { createGateway, type LanguageModel } from 'ai'

/** Available models via Vercel AI Gateway */
export const MODELS = {
  fast: 'google/gemini-2.5-flash-lite',
  balanced: 'google/gemini-2.5-flash',
  best: 'anthropic/claude-sonnet-4.5',
} as const

/** Per-agent model configuration */
export const AGENT_MODELS = {
  classifier: MODELS.fast,
  checklistFilter: MODELS.fast,
  missingItems: MODELS.balanced,
  redFlagDetector: MODELS.best,
} as const

export type AgentType = keyof typeof AGENT_MODELS

export type AgentModels = Record<AgentType, LanguageModel>

/** Build the model set for a pipeline run */
export function createAgentModels(apiKey: string): AgentModels {
  const gateway = createGateway({ apiKey })
  const modelFor = (agent: AgentType) => gateway(AGENT_MODELS[agent])

  return {
    classifier: modelFor('classifier'),
    checklistFilter: modelFor('checklistFilter'),
    missingItems: modelFor('missingItems'),
    redFlagDetector: modelFor('redFlagDetector'),
  }
}

/** Default generation config */
export const GENERATION_CONFIG = {
  temperature: 0,
  maxOutputTokens: 4096,
} as const

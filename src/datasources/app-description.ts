import type { AppDescriptionConfig } from '../models/config.js';
import type { PromptData } from '../models/prompt-data.js';

export function fetchAppDescription(config: AppDescriptionConfig): PromptData {
  return {
    description: ['Information: [App Description]', config.description],
  };
}

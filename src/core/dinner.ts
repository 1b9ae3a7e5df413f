import { hasKey } from './context.js';
import type { PromptSet } from './prompts.js';
import { defineStage, fillTemplate, templateStage, type StageSpec } from './stage.js';

export const DISH_NAME = 'dish_name';
export const SHOPPING_LIST = 'shopping_list';

/**
 * idea -> shopping -> recipe. A dish carried over from an earlier turn
 * switches the idea stage to its follow-up prompt so refinements build on it.
 */
export function createDinnerStages(prompts: PromptSet): StageSpec[] {
  const idea = defineStage({
    name: 'idea',
    requires: [],
    outputKey: DISH_NAME,
    buildPrompt: (context, query, vars) => {
      const template = hasKey(context, DISH_NAME) ? prompts.idea_followup : prompts.idea;
      return fillTemplate(template, context, query, vars);
    },
  });

  const shopping = templateStage({
    name: 'shopping',
    requires: [DISH_NAME],
    outputKey: SHOPPING_LIST,
    template: prompts.shopping,
  });

  const recipe = templateStage({
    name: 'recipe',
    requires: [DISH_NAME, SHOPPING_LIST],
    outputKey: null,
    template: prompts.recipe,
  });

  return [idea, shopping, recipe];
}

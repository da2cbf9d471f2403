/**
 * Built-in catalog of phrases parents hear most often.
 * Used as prompt context and for the "examples" / "similar" screens.
 */

import type { ExampleCategory, ExamplePhrase } from './types.js';

const CATALOG: readonly ExamplePhrase[] = Object.freeze(([
  {
    phrase: 'Отстань!',
    category: 'boundaries',
    emotionalContext: 'Перегруженность, потребность в личном пространстве',
    typicalMeaning: 'Мне нужно время побыть одному и разобраться в своих чувствах',
    suggestedApproach: 'Дайте пространство, но покажите готовность поговорить позже',
  },
  {
    phrase: 'Ты ничего не понимаешь',
    category: 'disconnection',
    emotionalContext: 'Чувство непонимания, одиночество',
    typicalMeaning: 'Мне кажется, что мои чувства и опыт обесценивают',
    suggestedApproach: 'Признайте сложность ситуации и покажите желание понять',
  },
  {
    phrase: 'Мне всё равно',
    category: 'defense',
    emotionalContext: 'Защитная реакция на разочарование или боль',
    typicalMeaning: 'Мне очень важно, но я боюсь показать уязвимость',
    suggestedApproach: 'Не давите, покажите принятие любого решения',
  },
  {
    phrase: 'Ненавижу школу!',
    category: 'frustration',
    emotionalContext: 'Стресс, социальное давление, усталость',
    typicalMeaning: 'В школе происходит что-то, с чем я не справляюсь',
    suggestedApproach: 'Узнайте о конкретных ситуациях без критики',
  },
  {
    phrase: 'Не хочу об этом говорить',
    category: 'boundaries',
    emotionalContext: 'Неготовность к обсуждению, страх осуждения',
    typicalMeaning: 'Мне нужно время обдумать или я не доверяю реакции',
    suggestedApproach: 'Уважайте границы, предложите альтернативные способы поддержки',
  },
  {
    phrase: 'У меня всё нормально',
    category: 'masking',
    emotionalContext: 'Скрытие проблем, нежелание беспокоить',
    typicalMeaning: 'Есть проблемы, но я не готов ими делиться',
    suggestedApproach: 'Покажите доступность без навязчивости',
  },
  {
    phrase: 'Достали все!',
    category: 'overwhelm',
    emotionalContext: 'Эмоциональное истощение, перегрузка',
    typicalMeaning: 'Я устал от социального взаимодействия и давления',
    suggestedApproach: 'Предложите способы снизить нагрузку',
  },
  {
    phrase: 'Уйду из дома!',
    category: 'desperation',
    emotionalContext: 'Чувство безвыходности, желание контроля',
    typicalMeaning: 'Мне невыносимо тяжело и я не вижу другого выхода',
    suggestedApproach: 'Серьёзно отнеситесь к чувствам, предложите совместный поиск решения',
  },
] satisfies ExamplePhrase[]).map((example): ExamplePhrase => Object.freeze(example)));

const CATEGORY_LABELS: Readonly<Record<ExampleCategory, string>> = Object.freeze({
  boundaries: 'Границы и пространство',
  disconnection: 'Непонимание и отчуждение',
  defense: 'Защитные реакции',
  frustration: 'Фрустрация и злость',
  masking: 'Скрытие чувств',
  overwhelm: 'Перегруженность',
  desperation: 'Отчаяние',
});

const EDGE_PUNCTUATION = /^[\s!?.,…"«»'()-]+|[\s!?.,…"«»'()-]+$/g;

/**
 * Lower-cases, folds ё into е and drops punctuation around the phrase
 */
export function normalizePhrase(phrase: string): string {
  return phrase.toLowerCase().replace(/ё/g, 'е').replace(EDGE_PUNCTUATION, '');
}

/**
 * True when either phrase contains the other after normalization.
 * Short catalog phrases will match unrelated sentences that happen to contain them.
 */
export function matchesPattern(example: ExamplePhrase, userPhrase: string): boolean {
  const normalizedUser = normalizePhrase(userPhrase);
  if (!normalizedUser) return false;

  const normalizedExample = normalizePhrase(example.phrase);
  return normalizedUser.includes(normalizedExample) || normalizedExample.includes(normalizedUser);
}

export function getCatalog(): readonly ExamplePhrase[] {
  return CATALOG;
}

export function getCategories(): Readonly<Record<ExampleCategory, string>> {
  return CATEGORY_LABELS;
}

export function getByCategory(category: ExampleCategory): ExamplePhrase[] {
  return CATALOG.filter((example) => example.category === category);
}

/**
 * Catalog entries related to the phrase, in catalog order
 */
export function findSimilar(userPhrase: string): ExamplePhrase[] {
  return CATALOG.filter((example) => matchesPattern(example, userPhrase));
}

/**
 * Exact (case-insensitive) lookup by phrase text
 */
export function getExampleByPhrase(phrase: string): ExamplePhrase | undefined {
  const needle = phrase.toLowerCase();
  return CATALOG.find((example) => example.phrase.toLowerCase() === needle);
}

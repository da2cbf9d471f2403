/**
 * Chat rendering for analyses and catalog entries (plain text, no parse mode)
 */

import { EMOTION_NAMES } from '../domain/emotions.js';
import type { AnalysisRecord, ExamplePhrase } from '../domain/types.js';

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function bullets(items: readonly string[]): string {
  return items.map((item) => `• ${item}`).join('\n');
}

export function formatAnalysis(analysis: AnalysisRecord): string {
  const emotions = analysis.emotionalStates.map((state) => EMOTION_NAMES[state]).join(', ');

  const safetyText = analysis.safetyNotice
    ? `🚨 СРОЧНО О БЕЗОПАСНОСТИ:\n${analysis.safetyNotice}\n\n`
    : '';

  return `🔍 Анализ фразы: "${analysis.originalPhrase}"

${safetyText}📊 ЧТО РЕБЁНОК ЧУВСТВУЕТ:
${capitalize(emotions)}

💭 ЧТО НА САМОМ ДЕЛЕ ОЗНАЧАЕТ:
${analysis.trueMeaning}

🎯 ПОТРЕБНОСТЬ РЕБЁНКА:
${analysis.childNeeds}

💬 КАК ЛУЧШЕ ОТВЕТИТЬ:
${bullets(analysis.suggestedResponses)}

⚠️ ЧЕГО ИЗБЕГАТЬ:
${bullets(analysis.whatToAvoid)}`;
}

export function formatExample(example: ExamplePhrase): string {
  return `📚 Пример фразы: "${example.phrase}"

🎭 Эмоциональный контекст:
${example.emotionalContext}

💭 Типичное значение:
${example.typicalMeaning}

💡 Рекомендуемый подход:
${example.suggestedApproach}`;
}

export function formatSimilar(phrase: string, examples: readonly ExamplePhrase[]): string {
  if (examples.length === 0) {
    return `📚 Для фразы "${phrase}" похожих примеров в базе нет.\n\nПосмотрите весь список — возможно, что-то окажется близким.`;
  }

  const lines = examples.map((example) => `• "${example.phrase}" — ${example.typicalMeaning}`);
  return `📚 Похожие фразы:\n\n${lines.join('\n')}`;
}

export function formatErrorMessage(): string {
  return `⚠️ Упс! Что-то пошло не так.

Возможно, фраза слишком короткая или содержит только эмодзи.

Попробуйте написать полную фразу, которую сказал ребёнок.`;
}

export function formatRateLimited(waitSeconds: number | null): string {
  return `⏱ Слишком много запросов. Подождите ${waitSeconds ?? 0} секунд.`;
}

import { InlineKeyboard } from 'grammy';
import type { ExamplePhrase } from '../domain/types.js';

const EXAMPLE_EMOJI: Record<string, string> = {
  'Отстань!': '😤',
  'Ты ничего не понимаешь': '🙄',
  'Мне всё равно': '😑',
  'Ненавижу школу!': '😠',
  'Не хочу об этом говорить': '🤐',
  'У меня всё нормально': '😔',
  'Достали все!': '😡',
  'Уйду из дома!': '🚪',
};

const HOME_BUTTON = '🏠 Главное меню';

export function mainMenu(): InlineKeyboard {
  return new InlineKeyboard()
    .text('🔍 Расшифровать фразу', 'decode').row()
    .text('📚 Посмотреть примеры', 'examples').row()
    .text('❓ Как это работает', 'how_it_works').row()
    .text('💡 Советы родителям', 'tips');
}

export function afterAnalysisMenu(): InlineKeyboard {
  return new InlineKeyboard()
    .text('🔄 Новая фраза', 'decode')
    .text('💡 Ещё варианты', 'more_options').row()
    .text('📚 Похожие примеры', 'similar')
    .text(HOME_BUTTON, 'home').row()
    .text('👍 Полезно', 'feedback_positive')
    .text('👎 Не помогло', 'feedback_negative');
}

/**
 * One button per example; callback data carries the catalog index
 */
export function examplesMenu(examples: readonly ExamplePhrase[], catalog: readonly ExamplePhrase[] = examples): InlineKeyboard {
  const keyboard = new InlineKeyboard();

  for (const example of examples) {
    const emoji = EXAMPLE_EMOJI[example.phrase] ?? '💭';
    keyboard.text(`${emoji} "${example.phrase}"`, `example_${catalog.indexOf(example)}`).row();
  }

  return keyboard.text(HOME_BUTTON, 'home');
}

export function backToMenu(): InlineKeyboard {
  return new InlineKeyboard()
    .text('🔍 Попробовать', 'decode').row()
    .text(HOME_BUTTON, 'home');
}

export function errorMenu(): InlineKeyboard {
  return new InlineKeyboard()
    .text('🔄 Попробовать снова', 'decode').row()
    .text(HOME_BUTTON, 'home');
}

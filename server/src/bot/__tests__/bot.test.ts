import { describe, it, expect, vi } from 'vitest';
import { InlineKeyboard } from 'grammy';
import type { Update } from 'grammy/types';
import { createBot } from '../index.js';
import { createAnalysisService } from '../../services/analysis.js';
import { Analytics } from '../../services/analytics.js';
import { InteractionLog } from '../../services/interactions.js';
import { RateLimiter } from '../../services/rate-limiter.js';
import { getMessage } from '../../services/config.js';
import type { CompletionResult } from '../../services/completion.js';
import { formatErrorMessage, formatExample, formatRateLimited, formatSimilar } from '../../services/formatter.js';
import { getCatalog } from '../../domain/examples.js';

const MODEL_ANSWER = `ЭМОЦИОНАЛЬНОЕ СОСТОЯНИЕ:
overwhelmed
ИСТИННЫЙ СМЫСЛ:
Нужно время побыть одному
ПОТРЕБНОСТЬ РЕБЁНКА:
Пространство
ВАРИАНТЫ ОТВЕТА:
1. Я рядом
ЧЕГО ИЗБЕГАТЬ:
- Не давить`;

const PARENT = { id: 1, is_bot: false, first_name: 'Анна' };
const CHAT = { id: 1, type: 'private' as const, first_name: 'Анна' };

interface ApiCall {
  method: string;
  payload: Record<string, unknown>;
}

type FailureRule = (call: ApiCall) => boolean;

let updateId = 0;

function textUpdate(text: string): Update {
  updateId += 1;
  const command = text.startsWith('/')
    ? { entities: [{ type: 'bot_command' as const, offset: 0, length: text.split(' ')[0].length }] }
    : {};
  return {
    update_id: updateId,
    message: { message_id: updateId, date: 1, chat: CHAT, from: PARENT, text, ...command },
  };
}

function callbackUpdate(data: string): Update {
  updateId += 1;
  return {
    update_id: updateId,
    callback_query: {
      id: `cb-${updateId}`,
      from: PARENT,
      chat_instance: 'chat-1',
      data,
      message: { message_id: 50, date: 1, chat: CHAT, text: 'menu' },
    },
  };
}

function fakeResult(method: string, payload: Record<string, unknown>, messageId: number): unknown {
  if (method === 'getMe') {
    return {
      id: 999,
      is_bot: true,
      first_name: 'Decoder',
      username: 'decoder_test_bot',
      can_join_groups: true,
      can_read_all_group_messages: false,
      supports_inline_queries: false,
    };
  }
  if (method === 'sendMessage') {
    return { message_id: messageId, date: 1, chat: CHAT, text: payload.text };
  }
  return true;
}

async function setup(options: { maxRequests?: number; complete?: (prompt: string) => Promise<CompletionResult> } = {}) {
  const complete = vi.fn(options.complete ?? (async (_prompt: string): Promise<CompletionResult> => ({ ok: true, text: MODEL_ANSWER })));
  const interactions = new InteractionLog();
  const bot = createBot('test-token', {
    analysis: createAnalysisService({ completion: { complete } }),
    interactions,
    rateLimiter: new RateLimiter({ maxRequests: options.maxRequests ?? 10, windowSeconds: 60, now: () => 0 }),
    analytics: new Analytics(),
    phraseBounds: { minLength: 2, maxLength: 500 },
    childAgeRange: '10-17',
  });

  const calls: ApiCall[] = [];
  const failures: FailureRule[] = [];
  let messageId = 100;

  bot.api.config.use(async (_prev, method, payload) => {
    const call: ApiCall = { method, payload: Object.fromEntries(Object.entries(payload ?? {})) };
    calls.push(call);

    const failure = failures.findIndex((rule) => rule(call));
    if (failure !== -1) {
      failures.splice(failure, 1);
      return { ok: false, error_code: 429, description: 'Too Many Requests: retry after 1' };
    }

    messageId += 1;
    return { ok: true, result: fakeResult(method, call.payload, messageId) } as never;
  });

  await bot.init();
  calls.length = 0;

  const sent = () => calls.filter((call) => call.method === 'sendMessage').map((call) => String(call.payload.text));

  return {
    bot,
    calls,
    complete,
    interactions,
    sent,
    failOnce: (rule: FailureRule) => failures.push(rule),
    send: (text: string) => bot.handleUpdate(textUpdate(text)),
    press: (data: string) => bot.handleUpdate(callbackUpdate(data)),
    reset: () => {
      calls.length = 0;
    },
  };
}

function buttons(call: ApiCall | undefined): string[] {
  const markup = call?.payload.reply_markup;
  if (!(markup instanceof InlineKeyboard)) return [];
  return markup.inline_keyboard.flat().flatMap((button) => ('callback_data' in button ? [button.callback_data] : []));
}

describe('bot', () => {
  it('greets the parent on /start', async () => {
    const { send, sent, calls } = await setup();

    await send('/start');

    expect(sent()).toEqual([getMessage('msg.welcome', { name: 'Анна' })]);
    expect(buttons(calls[0])).toEqual(['decode', 'examples', 'how_it_works', 'tips']);
  });

  it('shows the main menu for text outside the decode flow', async () => {
    const { send, sent, complete } = await setup();

    await send('Привет');

    expect(sent()).toEqual([getMessage('msg.main_menu')]);
    expect(complete).not.toHaveBeenCalled();
  });

  it('decodes a phrase after the decode button', async () => {
    const { send, press, sent, calls, complete, interactions, reset } = await setup();

    await press('decode');
    expect(sent()).toEqual([getMessage('msg.enter_phrase')]);
    reset();

    await send('Отстань от меня');

    expect(calls.map((call) => call.method)).toEqual(['sendChatAction', 'sendMessage', 'deleteMessage', 'sendMessage']);
    expect(sent()[0]).toBe(getMessage('msg.analyzing'));
    expect(sent()[1]).toContain('Анализ фразы: "Отстань от меня"');
    expect(buttons(calls[3])).toEqual([
      'decode',
      'more_options',
      'similar',
      'home',
      'feedback_positive',
      'feedback_negative',
    ]);
    expect(complete).toHaveBeenCalledTimes(1);
    expect(interactions.getLatest(1)?.phrase).toBe('Отстань от меня');
  });

  it('returns to the menu after an analysis', async () => {
    const { send, press, sent, reset } = await setup();
    await press('decode');
    await send('Отстань от меня');
    reset();

    await send('Ещё одна фраза');

    expect(sent()).toEqual([getMessage('msg.main_menu')]);
  });

  it('rejects a phrase that fails validation', async () => {
    const { send, press, sent, complete, reset } = await setup();
    await press('decode');
    reset();

    await send('а');
    expect(sent()).toEqual([formatErrorMessage()]);
    reset();

    await send('Отстань');
    expect(sent()).toEqual([getMessage('msg.main_menu')]);
    expect(complete).not.toHaveBeenCalled();
  });

  it('asks to wait while a phrase is being analyzed', async () => {
    let release: (result: CompletionResult) => void = () => undefined;
    const pending = new Promise<CompletionResult>((resolve) => {
      release = resolve;
    });
    const { send, press, sent, complete, reset } = await setup({ complete: async () => pending });
    await press('decode');
    reset();

    const first = send('Отстань от меня');
    await vi.waitFor(() => expect(complete).toHaveBeenCalledTimes(1));

    await send('Ну что там?');
    expect(sent()).toEqual([getMessage('msg.analyzing'), getMessage('msg.analyzing')]);

    release({ ok: true, text: MODEL_ANSWER });
    await first;

    expect(sent()[2]).toContain('Анализ фразы: "Отстань от меня"');
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('limits messages but not button presses', async () => {
    const { send, press, sent, reset } = await setup({ maxRequests: 2 });
    await send('/start');
    await send('Привет');
    reset();

    await send('Ещё');
    expect(sent()).toEqual([formatRateLimited(60)]);
    reset();

    await press('tips');
    expect(sent()).toEqual([getMessage('msg.tips')]);
  });

  it('counts more options against the limit', async () => {
    const { send, press, sent, complete, reset } = await setup({ maxRequests: 2 });
    await press('decode');
    await send('Отстань от меня');

    await press('more_options');
    expect(complete).toHaveBeenCalledTimes(2);
    expect(complete.mock.calls[1][0]).toContain(
      'Дополнительный контекст: Родитель уже видел разбор этой фразы'
    );
    reset();

    await press('more_options');
    expect(sent()).toEqual([formatRateLimited(60)]);
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it('asks for a phrase before more options or similar examples', async () => {
    const { press, sent } = await setup();

    await press('more_options');
    await press('similar');

    expect(sent()).toEqual([getMessage('msg.no_previous_phrase'), getMessage('msg.no_previous_phrase')]);
  });

  it('lists catalog phrases similar to the last one', async () => {
    const { send, press, sent, calls, reset } = await setup();
    await press('decode');
    await send('Отстань от меня');
    reset();

    await press('similar');

    expect(sent()).toEqual([formatSimilar('Отстань от меня', [getCatalog()[0]])]);
    expect(buttons(calls.find((call) => call.method === 'sendMessage'))).toEqual(['example_0', 'home']);
  });

  it('shows a catalog entry by index', async () => {
    const { press, sent } = await setup();

    await press('example_3');
    await press('example_99');

    expect(sent()).toEqual([formatExample(getCatalog()[3])]);
  });

  it('attaches feedback to the latest interaction', async () => {
    const { send, press, calls, interactions, reset } = await setup();
    await press('decode');
    await send('Отстань от меня');
    reset();

    await press('feedback_negative');

    expect(interactions.getLatest(1)?.feedback).toBe('negative');
    expect(calls).toEqual([
      { method: 'answerCallbackQuery', payload: expect.objectContaining({ text: getMessage('msg.feedback_negative') }) },
    ]);
  });

  it('thanks for feedback without a previous phrase', async () => {
    const { press, calls } = await setup();

    await press('feedback_positive');

    expect(calls[0].payload.text).toBe(getMessage('msg.feedback_positive'));
  });

  it('recovers when the status message cannot be sent', async () => {
    const { send, press, sent, complete, failOnce, reset } = await setup();
    failOnce((call) => call.method === 'sendMessage' && call.payload.text === getMessage('msg.analyzing'));
    await press('decode');
    reset();

    await send('Отстань от меня');
    expect(sent()).toEqual([getMessage('msg.analyzing'), formatErrorMessage()]);
    expect(complete).not.toHaveBeenCalled();
    reset();

    await send('Отстань от меня');
    expect(sent()).toEqual([getMessage('msg.main_menu')]);
    reset();

    await press('decode');
    await send('Отстань от меня');
    expect(sent().at(-1)).toContain('Анализ фразы: "Отстань от меня"');
  });

  it('apologizes when a handler fails', async () => {
    const { press, sent, failOnce } = await setup();
    failOnce((call) => call.method === 'answerCallbackQuery');

    await press('tips');

    expect(sent()).toEqual([getMessage('msg.error_generic')]);
  });
});

import { beforeEach, describe, expect, test, vi } from 'vitest';
import { AIMessage, HumanMessage, SystemMessage, ToolMessage } from '@langchain/core/messages';
import { Agent } from '../src/agent/agent.js';
import type { AgentEvent, DoneEvent } from '../src/agent/types.js';
import { fetchCompanySnapshot, fetchHistory, type PriceBar } from '../src/tools/market/yahoo-client.js';
import { InMemoryChatHistory } from '../src/utils/in-memory-chat-history.js';
import { ScriptedModel, callTool, lastToolOutput, reply } from './helpers/scripted-model.js';

vi.mock('../src/tools/market/yahoo-client.js', () => ({
  fetchCompanySnapshot: vi.fn(),
  fetchNews: vi.fn(),
  fetchHistory: vi.fn(),
}));

const BARS: PriceBar[] = [
  { date: '2026-05-01', open: 100, high: 101, low: 99, close: 100, volume: 1000 },
  { date: '2026-10-16', open: 120, high: 126, low: 119, close: 125, volume: 1500 },
];

async function runAgent(agent: Agent, query: string, history?: InMemoryChatHistory): Promise<{ events: AgentEvent[]; done: DoneEvent }> {
  const events: AgentEvent[] = [];
  for await (const event of agent.run(query, history)) {
    events.push(event);
  }
  const done = events[events.length - 1];
  if (done?.type !== 'done') throw new Error('agent did not finish');
  return { events, done };
}

beforeEach(() => {
  vi.mocked(fetchCompanySnapshot).mockReset();
  vi.mocked(fetchHistory).mockReset();
});

describe('Agent', () => {
  test('answers a price question through the price tool', async () => {
    vi.mocked(fetchCompanySnapshot).mockResolvedValue({
      ticker: 'AAPL',
      longName: 'Apple Inc.',
      currentPrice: 190.5,
      previousClose: 188,
    });
    const model = new ScriptedModel([
      () => callTool('get_stock_price', { ticker: 'AAPL' }, 'call_1'),
      (messages) => {
        const output = lastToolOutput(messages);
        const price = typeof output === 'object' && output !== null && 'summary' in output ? String(output.summary).split('\n')[1] : '';
        return reply(`AAPL is trading at ${price.replace('Current Price: ', '')}.`);
      },
    ]);
    const agent = Agent.create({ model, systemPrompt: 'test prompt' });

    const { events, done } = await runAgent(agent, "What is Apple's current stock price?");

    expect(done.answer).toBe('AAPL is trading at $190.50.');
    expect(done.iterations).toBe(2);
    expect(done.toolCalls).toHaveLength(1);
    expect(done.toolCalls[0].tool).toBe('get_stock_price');
    expect(done.toolCalls[0].args).toEqual({ ticker: 'AAPL' });
    const result = done.toolCalls[0].result;
    expect(result.kind === 'metrics' && result.entries[0].metrics.price).toBe(190.5);
    expect(events.map((e) => e.type)).toEqual(['thinking', 'tool_start', 'tool_end', 'thinking', 'answer_start', 'done']);

    const [system, human, aiCall, toolMessage] = model.calls[1];
    expect(system).toBeInstanceOf(SystemMessage);
    expect(system.content).toBe('test prompt');
    expect(human).toBeInstanceOf(HumanMessage);
    expect(aiCall).toBeInstanceOf(AIMessage);
    expect(toolMessage).toBeInstanceOf(ToolMessage);
    expect(toolMessage instanceof ToolMessage && toolMessage.tool_call_id).toBe('call_1');
  });

  test('keeps chart figures out of the model context', async () => {
    vi.mocked(fetchHistory).mockResolvedValue(BARS);
    const model = new ScriptedModel([
      () => callTool('plot_multiple_stocks', { tickers: ['NVDA', 'AMD'], period: '6mo' }),
      () => reply('NVDA and AMD both gained 25% over the last 6 months.'),
    ]);
    const agent = Agent.create({ model, systemPrompt: 'test prompt' });

    const { done } = await runAgent(agent, 'Compare NVDA vs AMD performance over 6 months');

    expect(lastToolOutput(model.calls[1])).toEqual({
      kind: 'chart',
      chartKind: 'comparison',
      tickers: ['NVDA', 'AMD'],
      period: '6mo',
      message: 'Created comparison chart for NVDA, AMD over 6mo. Shows percentage return from start of period.',
    });
    const result = done.toolCalls[0].result;
    expect(result.kind).toBe('chart');
    expect(result.kind === 'chart' && result.figure.data).toHaveLength(2);
    expect(done.answer).toContain('NVDA');
    expect(done.answer).toContain('AMD');
  });

  test('an unknown tool becomes an error result and the loop continues', async () => {
    const model = new ScriptedModel([
      () => callTool('get_weather', { city: 'Paris' }),
      () => reply('I can only help with stocks.'),
    ]);
    const agent = Agent.create({ model, systemPrompt: 'test prompt' });

    const { events, done } = await runAgent(agent, 'Weather in Paris?');

    expect(events).toContainEqual({ type: 'tool_error', tool: 'get_weather', error: "Tool 'get_weather' not found" });
    expect(done.toolCalls[0].result).toEqual({ kind: 'error', code: 'invalid_input', message: "Tool 'get_weather' not found" });
    expect(lastToolOutput(model.calls[1])).toEqual({ kind: 'error', code: 'invalid_input', message: "Tool 'get_weather' not found" });
    expect(done.answer).toBe('I can only help with stocks.');
  });

  test('arguments that fail the tool schema become invalid_input', async () => {
    const model = new ScriptedModel([() => callTool('get_stock_price', {}), () => reply('Which ticker?')]);
    const agent = Agent.create({ model, systemPrompt: 'test prompt' });

    const { done } = await runAgent(agent, 'Price?');

    const result = done.toolCalls[0].result;
    expect(result.kind === 'error' && result.code).toBe('invalid_input');
    expect(fetchCompanySnapshot).not.toHaveBeenCalled();
  });

  test('stops after the maximum number of iterations', async () => {
    vi.mocked(fetchCompanySnapshot).mockResolvedValue(null);
    const model = new ScriptedModel([() => callTool('get_stock_price', { ticker: 'ZZZZ1' })]);
    const agent = Agent.create({ model, systemPrompt: 'test prompt', maxIterations: 2 });

    const { done } = await runAgent(agent, 'Price of ZZZZ1?');

    expect(model.calls).toHaveLength(2);
    expect(done.iterations).toBe(2);
    expect(done.toolCalls).toHaveLength(2);
    expect(done.answer).toBe('Reached maximum iterations (2) without a final answer.');
  });

  test('answers directly when no tool is requested', async () => {
    const model = new ScriptedModel([() => reply('Hello! Ask me about any stock.')]);
    const agent = Agent.create({ model, systemPrompt: 'test prompt' });

    const { done } = await runAgent(agent, 'Hi');

    expect(done.answer).toBe('Hello! Ask me about any stock.');
    expect(done.toolCalls).toEqual([]);
    expect(done.iterations).toBe(1);
  });

  test('prior turns are sent between the system prompt and the query', async () => {
    const history = new InMemoryChatHistory();
    history.addTurn('What is AAPL?', 'Apple Inc.');
    const model = new ScriptedModel([() => reply('Tim Cook.')]);
    const agent = Agent.create({ model, systemPrompt: 'test prompt' });

    await runAgent(agent, 'Who runs it?', history);

    expect(model.calls[0].map((m) => m.content)).toEqual(['test prompt', 'What is AAPL?', 'Apple Inc.', 'Who runs it?']);
  });

  test('accumulates token usage across model calls', async () => {
    const usage = { input_tokens: 10, output_tokens: 5, total_tokens: 15 };
    vi.mocked(fetchCompanySnapshot).mockResolvedValue(null);
    const model = new ScriptedModel([
      () =>
        new AIMessage({
          content: '',
          tool_calls: [{ name: 'get_stock_price', args: { ticker: 'AAPL' }, id: 'call_1', type: 'tool_call' }],
          usage_metadata: usage,
        }),
      () => new AIMessage({ content: 'No data.', usage_metadata: usage }),
    ]);
    const agent = Agent.create({ model, systemPrompt: 'test prompt' });

    const { done } = await runAgent(agent, 'AAPL?');

    expect(done.tokenUsage).toEqual({ inputTokens: 20, outputTokens: 10, totalTokens: 30 });
  });
});

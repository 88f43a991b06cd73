import { AIMessageChunk } from '@langchain/core/messages';
import { extractText, StreamTranslator } from '../../../src/agent/util/stream.translator';
import { textChunk, toolArgsChunk, toolStartChunk } from '../mocks/mock-model';

describe('extractText', () => {
  test('returns string content unchanged', () => {
    expect(extractText('Hello')).toBe('Hello');
  });

  test('joins text and text_delta parts and skips the rest', () => {
    expect(extractText([
      { type: 'text', text: 'Hel' },
      { type: 'text_delta', text: 'lo', index: 0 },
      { type: 'input_json_delta', input: '{"url"', index: 1 },
      { type: 'tool_use', id: 'toolu_1', name: 'fetch', input: '' }
    ])).toBe('Hello');
  });
});

describe('StreamTranslator', () => {
  test('turns text chunks into text deltas and accumulates them', () => {
    const translator = new StreamTranslator();

    expect(translator.translate(textChunk('Hello, '))).toEqual([{ type: 'text_delta', content: 'Hello, ' }]);
    expect(translator.translate(textChunk('world'))).toEqual([{ type: 'text_delta', content: 'world' }]);
    expect(translator.end()).toEqual([]);
    expect(translator.accumulatedText).toBe('Hello, world');
  });

  test('ignores chunks without text or tool fragments', () => {
    const translator = new StreamTranslator();
    expect(translator.translate(new AIMessageChunk({ content: '' }))).toEqual([]);
  });

  test('reassembles a tool call from its fragments', () => {
    const translator = new StreamTranslator();

    expect(translator.translate(toolStartChunk('toolu_1', 'fetch'))).toEqual([
      { type: 'tool_start', tool: { id: 'toolu_1', name: 'fetch' } }
    ]);
    expect(translator.translate(toolArgsChunk('{"url": '))).toEqual([
      { type: 'tool_input_delta', content: '{"url": ', toolId: 'toolu_1' }
    ]);
    translator.translate(toolArgsChunk('"https://example.com"}'));

    expect(translator.end()).toEqual([
      { type: 'tool_call', tool: { id: 'toolu_1', name: 'fetch', input: { url: 'https://example.com' } } }
    ]);
  });

  test('closes the open tool block when the next one starts', () => {
    const translator = new StreamTranslator();
    translator.translate(toolStartChunk('toolu_1', 'fetch', 1));
    translator.translate(toolArgsChunk('{"url": "https://a.example"}', 1));

    expect(translator.translate(toolStartChunk('toolu_2', 'fetch', 2))).toEqual([
      { type: 'tool_call', tool: { id: 'toolu_1', name: 'fetch', input: { url: 'https://a.example' } } },
      { type: 'tool_start', tool: { id: 'toolu_2', name: 'fetch' } }
    ]);
  });

  test('closes the open tool block when text follows it', () => {
    const translator = new StreamTranslator();
    translator.translate(toolStartChunk('toolu_1', 'fetch'));

    expect(translator.translate(textChunk('Done.'))).toEqual([
      { type: 'tool_call', tool: { id: 'toolu_1', name: 'fetch', input: {} } },
      { type: 'text_delta', content: 'Done.' }
    ]);
    expect(translator.end()).toEqual([]);
  });

  test('drops argument fragments that arrive before a tool block', () => {
    const translator = new StreamTranslator();
    expect(translator.translate(toolArgsChunk('{"url": "x"}'))).toEqual([]);
    expect(translator.end()).toEqual([]);
  });
});

import { z } from 'zod';
import type { IEventEmitter, ToolInput } from '@agent-exec/core';
import { Events, ProtocolParseError } from '@agent-exec/core';

/**
 * Parsing for the `--output-format stream-json` protocol: one JSON object per
 * line. Only `assistant`, `user` and `result` frames carry anything we use;
 * other frame types and unknown fields are ignored.
 */

const FrameHeaderSchema = z.object({ type: z.unknown() });

const ContentBlockSchema = z.object({
  type: z.string().nullish(),
  text: z.string().nullish(),
  name: z.string().nullish(),
  input: z.record(z.unknown()).nullish(),
  content: z.unknown(),
});

const MessageFrameSchema = z.object({
  message: z
    .object({
      content: z.union([z.array(ContentBlockSchema), z.string()]).nullish(),
    })
    .nullish(),
});

const ResultFrameSchema = z.object({
  result: z.string().nullish(),
  duration_ms: z.number().nullish(),
});

type ContentBlock = z.infer<typeof ContentBlockSchema>;

export type StreamFrame =
  | { type: 'assistant'; content: ContentBlock[] }
  | { type: 'user'; content: ContentBlock[] }
  | { type: 'result'; result: string; durationMs: number }
  | { type: 'ignored'; rawType: string };

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, line: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || 'frame';
    throw new ProtocolParseError(
      `invalid stream-json frame at ${where}: ${issue?.message ?? 'unexpected shape'}`,
      line,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}

function blocksOf(frame: z.infer<typeof MessageFrameSchema>): ContentBlock[] {
  const content = frame.message?.content;
  return Array.isArray(content) ? content : [];
}

/** Parse one stdout line into a typed frame. Throws ProtocolParseError on bad input. */
export function parseStreamFrame(line: string): StreamFrame {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    throw new ProtocolParseError(
      `failed to parse stream-json line: ${error instanceof Error ? error.message : String(error)}`,
      line,
      { cause: error },
    );
  }

  const header = parseWith(FrameHeaderSchema, raw, line);

  switch (header.type) {
    case 'assistant':
      return { type: 'assistant', content: blocksOf(parseWith(MessageFrameSchema, raw, line)) };
    case 'user':
      return { type: 'user', content: blocksOf(parseWith(MessageFrameSchema, raw, line)) };
    case 'result': {
      const frame = parseWith(ResultFrameSchema, raw, line);
      return { type: 'result', result: frame.result ?? '', durationMs: frame.duration_ms ?? 0 };
    }
    default:
      return { type: 'ignored', rawType: typeof header.type === 'string' ? header.type : '' };
  }
}

function textOf(item: unknown): string {
  if (item === null || item === undefined) return '';
  if (typeof item === 'string') return item;
  if (typeof item === 'object') return JSON.stringify(item);
  return String(item);
}

/**
 * Coerce a tool_result `content` field to text: strings pass through, arrays
 * are concatenated element by element, anything else is empty.
 */
export function contentToString(content: unknown): string {
  if (typeof content === 'string') return content;
  if (Array.isArray(content)) return content.map(textOf).join('');
  return '';
}

/**
 * Turns parsed frames into bus events and remembers the final result text.
 * One instance per execution.
 */
export class StreamEventHandler {
  private resultText = '';

  constructor(private readonly emitter: IEventEmitter) {}

  /** Last non-empty `result` value seen so far */
  get finalText(): string {
    return this.resultText;
  }

  async handleLine(line: string): Promise<void> {
    const frame = parseStreamFrame(line);

    switch (frame.type) {
      case 'assistant':
        for (const block of frame.content) {
          if (block.type === 'text') {
            await this.emitter.emit(Events.ASSISTANT_TEXT, { text: block.text ?? '' });
          } else if (block.type === 'tool_use') {
            const input: ToolInput = block.input ?? {};
            await this.emitter.emit(Events.TOOL_USE, { name: block.name ?? '', input });
          }
        }
        break;

      case 'user':
        for (const block of frame.content) {
          if (block.type !== 'tool_result') continue;
          const content = contentToString(block.content);
          if (content) {
            await this.emitter.emit(Events.TOOL_RESULT, { content });
          }
        }
        break;

      case 'result':
        if (frame.result) {
          this.resultText = frame.result;
        }
        if (frame.durationMs > 0) {
          await this.emitter.emit(Events.EXECUTION_RESULT, { durationMs: frame.durationMs });
        }
        break;

      case 'ignored':
        break;
    }
  }
}

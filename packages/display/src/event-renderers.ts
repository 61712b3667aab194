import type { EventKind, EventPayloadMap } from '@agent-exec/core';
import { Colors, colorize, reverseVideo } from './colors.js';
import type { ColorStyle } from './colors.js';
import type { ContentFilter } from './content-filter.js';
import { formatContent, formatDuration, formatWrappedContent, indentContent } from './text.js';

export interface RenderContext {
  /** `[HH:MM:SS] ` of the event */
  time: string;
  filter: ContentFilter;
  width: number;
}

export type EventRenderer<K extends EventKind> = (
  payload: EventPayloadMap[K],
  ctx: RenderContext,
) => string;

export type EventRenderers = { [K in EventKind]: EventRenderer<K> };

/** Style per event kind; tool events are left uncoloured. */
export const EVENT_COLORS: Readonly<Record<EventKind, ColorStyle | undefined>> = {
  'run-started': Colors.BOLD_CYAN,
  'assistant-text': Colors.MAGENTA,
  'tool-use': undefined,
  'tool-result': undefined,
  'execution-result': Colors.BOLD_GREEN,
  'loop-started': Colors.BOLD_YELLOW,
  'iteration-started': Colors.BOLD_YELLOW,
  'iteration-completed': Colors.BOLD_GREEN,
  'iteration-failed': Colors.BOLD_RED,
  'loop-completed': Colors.BOLD_GREEN,
  'loop-interrupted': Colors.BOLD_RED,
  'sleep-started': Colors.BOLD_YELLOW,
  'evolve-started': Colors.BOLD_YELLOW,
  'round-started': Colors.BOLD_YELLOW,
  'improvement-started': Colors.BOLD_YELLOW,
  'comparison-started': Colors.BOLD_YELLOW,
  'comparison-retry': Colors.MAGENTA,
  'winner-selected': Colors.BOLD_GREEN,
  'evolve-completed': Colors.BOLD_GREEN,
  'evolve-interrupted': Colors.BOLD_RED,
  'branch-created': Colors.MAGENTA,
  'branch-checked-out': Colors.MAGENTA,
  'branch-deleted': Colors.MAGENTA,
  'commits-squashed': Colors.MAGENTA,
};

const c = EVENT_COLORS;

function metadataLine(label: string, value: string | undefined): string {
  return value ? `${indentContent(`${label}: ${value}`)}\n` : '';
}

/** One renderer per event kind; the formatter adds spacing around the result. */
export const EVENT_RENDERERS: EventRenderers = {
  'run-started': (p, ctx) =>
    colorize('🚀 Run Prompt Started', c['run-started']) +
    formatWrappedContent(p.prompt, ctx.width) +
    metadataLine('🌐 Base URL', p.baseUrl) +
    metadataLine('📁 Working Directory', p.cwd) +
    metadataLine('📄 File List', p.fileList),

  'assistant-text': (p, ctx) => colorize(`💬 ${ctx.time}${p.text}`, c['assistant-text']),

  'tool-use': (p, ctx) => {
    const input = JSON.stringify(ctx.filter.filterToolInput(p.name, p.input), null, 2);
    return (
      colorize(`🔧 ${ctx.time}Tool: ${p.name}`, c['tool-use']) +
      formatContent(ctx.filter.limitCodeBlock(input))
    );
  },

  'tool-result': (p, ctx) =>
    colorize(`📋 ${ctx.time}Tool Result`, c['tool-result']) +
    formatContent(ctx.filter.limitCodeBlock(p.content)),

  'execution-result': (p) =>
    colorize(`⏱️ Execution completed in ${formatDuration(p.durationMs)}`, c['execution-result']),

  'loop-started': (p) =>
    `${reverseVideo('🔄 Loop Started', c['loop-started'])}\n${indentContent(`🔢 Iterations: ${p.total}`)}`,

  'iteration-started': (p, ctx) =>
    reverseVideo(`▶️ ${ctx.time}Iteration ${p.current}/${p.total} started`, c['iteration-started']),

  'iteration-completed': (p, ctx) =>
    reverseVideo(
      `✅ ${ctx.time}Iteration ${p.current}/${p.total} completed in ${formatDuration(p.durationMs)}`,
      c['iteration-completed'],
    ),

  'iteration-failed': (p, ctx) =>
    reverseVideo(
      `❌ ${ctx.time}Iteration ${p.current}/${p.total} failed: ${p.error || 'unknown error'}`,
      c['iteration-failed'],
    ),

  'loop-completed': (p) =>
    reverseVideo(
      `🏁 Loop completed: ${p.successful}/${p.total} successful, ${p.failed} failed ` +
        `(Total: ${formatDuration(p.totalDurationMs)})`,
      c['loop-completed'],
    ),

  'loop-interrupted': (p) =>
    reverseVideo(
      `⚠️ Loop interrupted: ${p.completed}/${p.total} iterations completed`,
      c['loop-interrupted'],
    ),

  'sleep-started': (p, ctx) =>
    colorize(`💤 ${ctx.time}Sleeping for ${formatDuration(p.durationMs)}`, c['sleep-started']),

  'evolve-started': (p) =>
    `${reverseVideo('🧬 Evolution Started', c['evolve-started'])}\n${indentContent(`🔢 Iterations: ${p.total}`)}`,

  'round-started': (p) => reverseVideo(`🎯 Round ${p.round}/${p.total}`, c['round-started']),

  'improvement-started': (p, ctx) =>
    colorize(`🔨 ${ctx.time}Improving branch: ${p.branch}`, c['improvement-started']),

  'comparison-started': (p, ctx) =>
    colorize(`⚖️ ${ctx.time}Comparing: ${p.winner} vs ${p.challenger}`, c['comparison-started']),

  'comparison-retry': (p, ctx) =>
    colorize(`🔁 ${ctx.time}Comparison retry ${p.attempt}/${p.maxAttempts}`, c['comparison-retry']),

  'winner-selected': (p, ctx) =>
    colorize(`🏆 ${ctx.time}Winner: ${p.winner} (eliminated: ${p.loser})`, c['winner-selected']),

  'evolve-completed': (p) =>
    reverseVideo(
      `🎉 Evolution completed, final branch: ${p.finalBranch} ` +
        `(total duration: ${formatDuration(p.totalDurationMs)})`,
      c['evolve-completed'],
    ),

  'evolve-interrupted': (p) =>
    reverseVideo(
      `🛑 Evolution interrupted: ${p.completed}/${p.total} rounds completed`,
      c['evolve-interrupted'],
    ),

  'branch-created': (p, ctx) =>
    colorize(
      `🌿 ${ctx.time}Branch created: ${p.name}${p.base ? ` (from ${p.base})` : ''}`,
      c['branch-created'],
    ),

  'branch-checked-out': (p, ctx) =>
    colorize(`🔀 ${ctx.time}Checked out branch: ${p.name}`, c['branch-checked-out']),

  'branch-deleted': (p, ctx) => colorize(`🗑️ ${ctx.time}Branch deleted: ${p.name}`, c['branch-deleted']),

  'commits-squashed': (p, ctx) =>
    colorize(`📦 ${ctx.time}Commits squashed on branch: ${p.branch}`, c['commits-squashed']),
};

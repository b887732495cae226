/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export interface TextSegment {
  kind: 'thought' | 'content';
  text: string;
}

const OPEN_TAG = /<think(?:ing)?>/i;
const CLOSE_TAG = /<\/think(?:ing)?>/i;
const OPEN_TAGS = ['<think>', '<thinking>'];
const CLOSE_TAGS = ['</think>', '</thinking>'];

/**
 * Separates inline <think>/<thinking> blocks from reply text as fragments
 * stream in. A tag split across two fragments is held back until it can
 * be recognised, so the segments produced do not depend on where the
 * stream was cut.
 */
export class ThinkingSplitter {
  private buffer = '';
  private inThought = false;

  push(fragment: string): TextSegment[] {
    this.buffer += fragment;
    const segments: TextSegment[] = [];

    for (;;) {
      const pattern = this.inThought ? CLOSE_TAG : OPEN_TAG;
      const match = pattern.exec(this.buffer);
      if (!match) {
        break;
      }
      this.emit(segments, this.buffer.slice(0, match.index));
      this.buffer = this.buffer.slice(match.index + match[0].length);
      this.inThought = !this.inThought;
    }

    const held = this.partialTagStart();
    this.emit(segments, this.buffer.slice(0, held));
    this.buffer = this.buffer.slice(held);
    return segments;
  }

  /**
   * Releases whatever is still held back, e.g. a lone '<' at the end.
   */
  flush(): TextSegment[] {
    const segments: TextSegment[] = [];
    this.emit(segments, this.buffer);
    this.buffer = '';
    return segments;
  }

  get insideThought(): boolean {
    return this.inThought;
  }

  private emit(segments: TextSegment[], text: string): void {
    if (text.length > 0) {
      segments.push({ kind: this.inThought ? 'thought' : 'content', text });
    }
  }

  // Only the last '<' can begin a tag that is still incomplete.
  private partialTagStart(): number {
    const lt = this.buffer.lastIndexOf('<');
    if (lt === -1) {
      return this.buffer.length;
    }
    const tail = this.buffer.slice(lt).toLowerCase();
    const candidates = this.inThought ? CLOSE_TAGS : OPEN_TAGS;
    return candidates.some((tag) => tag.startsWith(tail))
      ? lt
      : this.buffer.length;
  }
}

/**
 * Splits a complete text in one go.
 */
export function splitThinking(text: string): { content: string; thought: string } {
  const splitter = new ThinkingSplitter();
  const segments = [...splitter.push(text), ...splitter.flush()];
  return {
    content: segments
      .filter((s) => s.kind === 'content')
      .map((s) => s.text)
      .join(''),
    thought: segments
      .filter((s) => s.kind === 'thought')
      .map((s) => s.text)
      .join(''),
  };
}

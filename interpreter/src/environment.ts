/**
 * Lexical scoping environment for the Quill interpreter.
 *
 * The environment is a stack of frames, one per active function call. Each
 * frame is a stack of blocks, one per nested statement block. Name lookups
 * only ever search the current frame: a function never sees its caller's
 * locals.
 */

import { QuillValue } from './values';

type Block = Map<string, QuillValue>;
type Frame = Block[];

export class Environment {
  private frames: Frame[] = [];

  /**
   * Enter a function call. The new frame starts with one block, which holds
   * the parameters.
   */
  pushFrame(): void {
    this.frames.push([new Map()]);
  }

  popFrame(): void {
    if (this.frames.pop() === undefined) {
      throw new Error('popFrame called with no active frame');
    }
  }

  pushBlock(): void {
    this.currentFrame().push(new Map());
  }

  popBlock(): void {
    if (this.currentFrame().pop() === undefined) {
      throw new Error('popBlock called with no open block');
    }
  }

  /**
   * Define a name in the innermost block. Returns false if the name is
   * already defined in that block; outer blocks are not consulted.
   */
  define(name: string, value: QuillValue): boolean {
    const block = this.innermostBlock();
    if (block.has(name)) return false;
    block.set(name, value);
    return true;
  }

  /**
   * Find a name, innermost block first. Undefined when it is not visible.
   */
  lookup(name: string): QuillValue | undefined {
    const frame = this.currentFrame();
    for (let i = frame.length - 1; i >= 0; i--) {
      const value = frame[i].get(name);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  /**
   * Overwrite the nearest visible binding of a name. Returns false when the
   * name is not defined anywhere in the current frame.
   */
  assign(name: string, value: QuillValue): boolean {
    const frame = this.currentFrame();
    for (let i = frame.length - 1; i >= 0; i--) {
      if (frame[i].has(name)) {
        frame[i].set(name, value);
        return true;
      }
    }
    return false;
  }

  /** Number of active frames. */
  get frameDepth(): number {
    return this.frames.length;
  }

  /** Number of blocks in the current frame (0 when no frame is active). */
  get blockDepth(): number {
    const frame = this.frames[this.frames.length - 1];
    return frame === undefined ? 0 : frame.length;
  }

  private currentFrame(): Frame {
    const frame = this.frames[this.frames.length - 1];
    if (frame === undefined) {
      throw new Error('No active frame');
    }
    return frame;
  }

  private innermostBlock(): Block {
    const frame = this.currentFrame();
    const block = frame[frame.length - 1];
    if (block === undefined) {
      throw new Error('No open block in the current frame');
    }
    return block;
  }
}

/**
 * Grammar parameters threaded through the productions: the current
 * indentation `n` and the syntactic context `c`.
 */

export enum YamlContext {
  BlockIn = 'block-in',
  BlockOut = 'block-out',
  BlockKey = 'block-key',
  FlowIn = 'flow-in',
  FlowOut = 'flow-out',
  FlowKey = 'flow-key',
}

export interface ParametricContext {
  readonly indent: number;
  readonly context: YamlContext;
}

/** Opaque handle returned by `push`; only the matching `pop` accepts it. */
export interface ContextToken {
  readonly depth: number;
}

export function isFlowContext(context: YamlContext): boolean {
  return context === YamlContext.FlowIn || context === YamlContext.FlowOut || context === YamlContext.FlowKey;
}

export function isKeyContext(context: YamlContext): boolean {
  return context === YamlContext.BlockKey || context === YamlContext.FlowKey;
}

/** Context of the entries inside a flow collection opened in `context`. */
export function inFlow(context: YamlContext): YamlContext {
  switch (context) {
    case YamlContext.FlowOut:
    case YamlContext.FlowIn:
      return YamlContext.FlowIn;
    case YamlContext.BlockKey:
    case YamlContext.FlowKey:
      return YamlContext.FlowKey;
    default:
      return YamlContext.FlowIn;
  }
}

/**
 * Indentation of the entries of a block sequence nested under a node at
 * `indent`. A sequence that is a mapping value may share its key's column.
 */
export function seqSpaces(indent: number, context: YamlContext): number {
  return context === YamlContext.BlockOut ? indent - 1 : indent;
}

export class ContextStack {
  private frames: ParametricContext[] = [];

  constructor(
    private readonly overflow: (depth: number) => Error,
    private readonly maxDepth = 512,
  ) {}

  get depth(): number {
    return this.frames.length;
  }

  push(context: YamlContext, indent: number): ContextToken {
    if (this.frames.length >= this.maxDepth) {
      throw this.overflow(this.maxDepth);
    }
    this.frames.push({ indent, context });
    return { depth: this.frames.length };
  }

  pop(token: ContextToken): void {
    if (token.depth !== this.frames.length) {
      throw new Error(`Context stack out of order: expected depth ${token.depth}, found ${this.frames.length}`);
    }
    this.frames.pop();
  }

  /** Run `fn` with a new frame; the frame is popped on every exit path. */
  within<T>(context: YamlContext, indent: number, fn: (ctx: ParametricContext) => T): T {
    const token = this.push(context, indent);
    try {
      return fn(this.current());
    } finally {
      this.pop(token);
    }
  }

  current(): ParametricContext {
    return this.frames[this.frames.length - 1] ?? { indent: -1, context: YamlContext.BlockIn };
  }
}

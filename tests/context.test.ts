import { ContextStack, inFlow, isFlowContext, isKeyContext, seqSpaces, YamlContext } from '../src/parser/context';

function stack(maxDepth?: number): ContextStack {
  return new ContextStack(depth => new Error(`too deep: ${depth}`), maxDepth);
}

describe('Grammar context', () => {
  describe('context helpers', () => {
    it('should classify flow and key contexts', () => {
      expect(isFlowContext(YamlContext.FlowKey)).toBe(true);
      expect(isFlowContext(YamlContext.BlockKey)).toBe(false);
      expect(isKeyContext(YamlContext.BlockKey)).toBe(true);
      expect(isKeyContext(YamlContext.FlowIn)).toBe(false);
    });

    it('should keep key contexts when entering a flow collection', () => {
      expect(inFlow(YamlContext.FlowOut)).toBe(YamlContext.FlowIn);
      expect(inFlow(YamlContext.FlowIn)).toBe(YamlContext.FlowIn);
      expect(inFlow(YamlContext.BlockKey)).toBe(YamlContext.FlowKey);
      expect(inFlow(YamlContext.FlowKey)).toBe(YamlContext.FlowKey);
    });

    it('should let sequences under a mapping key share its column', () => {
      expect(seqSpaces(2, YamlContext.BlockOut)).toBe(1);
      expect(seqSpaces(2, YamlContext.BlockIn)).toBe(2);
    });
  });

  describe('ContextStack', () => {
    it('should default to block-in at indentation -1', () => {
      const contexts = stack();
      expect(contexts.current()).toEqual({ indent: -1, context: YamlContext.BlockIn });
      expect(contexts.depth).toBe(0);
    });

    it('should push and pop frames in order', () => {
      const contexts = stack();
      const outer = contexts.push(YamlContext.BlockOut, 0);
      const inner = contexts.push(YamlContext.FlowIn, 2);
      expect(contexts.current()).toEqual({ indent: 2, context: YamlContext.FlowIn });
      expect(contexts.depth).toBe(2);
      contexts.pop(inner);
      contexts.pop(outer);
      expect(contexts.depth).toBe(0);
    });

    it('should refuse to pop out of order', () => {
      const contexts = stack();
      const outer = contexts.push(YamlContext.BlockOut, 0);
      contexts.push(YamlContext.BlockIn, 2);
      expect(() => contexts.pop(outer)).toThrow('Context stack out of order: expected depth 1, found 2');
    });

    it('should pop the frame when the callback throws', () => {
      const contexts = stack();
      expect(() =>
        contexts.within(YamlContext.FlowIn, 4, () => {
          throw new Error('boom');
        }),
      ).toThrow('boom');
      expect(contexts.depth).toBe(0);
    });

    it('should pass the new frame to the callback', () => {
      const contexts = stack();
      const frame = contexts.within(YamlContext.BlockKey, 3, ctx => ctx);
      expect(frame).toEqual({ indent: 3, context: YamlContext.BlockKey });
    });

    it('should fail past the depth limit', () => {
      const contexts = stack(2);
      contexts.push(YamlContext.FlowIn, 0);
      contexts.push(YamlContext.FlowIn, 0);
      expect(() => contexts.push(YamlContext.FlowIn, 0)).toThrow('too deep: 2');
    });
  });
});

import { callSiteFromStack, v8CallSiteResolver } from '../CallSiteResolver';

const STACK = [
  'Error: probe',
  '    at v8CallSiteResolver (/proj/node_modules/linecov/dist/engine/CallSiteResolver.js:40:20)',
  '    at assertEqual (/proj/lib/assert.js:12:5)',
  '    at Object.<anonymous> (/proj/spec/math.lua:7:3)',
  '    at file:///proj/main.mjs:3:1',
  '    at Array.map (native)',
].join('\n');

describe('callSiteFromStack', () => {
  it('should pick the frame at the given index', () => {
    expect(callSiteFromStack(STACK, 1)).toEqual({ path: '/proj/lib/assert.js', line: 12 });
    expect(callSiteFromStack(STACK, 2)).toEqual({ path: '/proj/spec/math.lua', line: 7 });
  });

  it('should convert file URLs to paths', () => {
    expect(callSiteFromStack(STACK, 3)).toEqual({ path: '/proj/main.mjs', line: 3 });
  });

  it('should return null for frames without a location', () => {
    expect(callSiteFromStack(STACK, 4)).toBeNull();
  });

  it('should return null when the stack is missing or too short', () => {
    expect(callSiteFromStack(undefined, 0)).toBeNull();
    expect(callSiteFromStack(STACK, 9)).toBeNull();
    expect(callSiteFromStack(STACK, -1)).toBeNull();
  });
});

describe('v8CallSiteResolver', () => {
  it('should resolve its caller to this file', () => {
    const site = v8CallSiteResolver(0);

    expect(site?.path).toBe(__filename);
    expect(site?.line).toBeGreaterThan(0);
  });

  it('should restore the stack trace limit', () => {
    const limit = Error.stackTraceLimit;
    v8CallSiteResolver(limit + 5);
    expect(Error.stackTraceLimit).toBe(limit);
  });
});

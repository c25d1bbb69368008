import { describe, it, expect } from 'vitest';
import { errorCodeFor, statusForError } from '@api/middleware/index';
import {
  InsufficientDataError,
  OverflowError,
  ParseError,
  RoutingError,
  StateError,
} from '@core/errors';

describe('statusForError', () => {
  it('maps malformed input to 400', () => {
    expect(statusForError(new ParseError('bad'))).toBe(400);
  });

  it('maps run failures to 422', () => {
    expect(statusForError(new OverflowError('big'))).toBe(422);
    expect(statusForError(new RoutingError('lost'))).toBe(422);
    expect(statusForError(new InsufficientDataError('idle'))).toBe(422);
  });

  it('maps internal failures to 500', () => {
    expect(statusForError(new StateError('missing'))).toBe(500);
    expect(statusForError(new Error('boom'))).toBe(500);
  });
});

describe('body-parser errors', () => {
  // express.json tags its failures with `status` and `type`.
  const malformedJson = () =>
    Object.assign(new SyntaxError('Unexpected token } in JSON at position 12'), {
      status: 400,
      type: 'entity.parse.failed',
    });

  it('keeps the 400 of a malformed JSON body', () => {
    expect(statusForError(malformedJson())).toBe(400);
  });

  it('reports a malformed JSON body as PARSE_ERROR', () => {
    expect(errorCodeFor(malformedJson())).toBe('PARSE_ERROR');
  });

  it('keeps other client statuses such as 413', () => {
    const tooLarge = Object.assign(new Error('request entity too large'), {
      status: 413,
      type: 'entity.too.large',
    });
    expect(statusForError(tooLarge)).toBe(413);
    expect(errorCodeFor(tooLarge)).toBeUndefined();
  });

  it('does not pass through server statuses', () => {
    expect(statusForError(Object.assign(new Error('down'), { status: 503 }))).toBe(500);
  });

  it('uses the simulation code for simulation errors', () => {
    expect(errorCodeFor(new RoutingError('lost'))).toBe('ROUTING_ERROR');
    expect(errorCodeFor(new Error('boom'))).toBeUndefined();
  });
});

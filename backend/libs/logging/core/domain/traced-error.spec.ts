import { LogFieldKey } from '../value-objects';
import { LogFields } from './error-chain';
import { StackInhibitSet } from './stack-inhibit-set';
import { StackTracer, TracedError, getTracedError } from './traced-error';

class NotFoundError extends Error {}

describe('StackTracer', () => {
  let inhibitSet: StackInhibitSet;
  let tracer: StackTracer;
  let reporter: jest.Mock<void, [string, LogFields]>;

  beforeEach(() => {
    inhibitSet = new StackInhibitSet();
    tracer = new StackTracer(inhibitSet);
    reporter = jest.fn<void, [string, LogFields]>();
    tracer.setReporter(reporter);
  });

  describe('trace', () => {
    it('should return undefined for null and undefined without reporting', () => {
      expect(tracer.trace(null)).toBeUndefined();
      expect(tracer.trace(undefined)).toBeUndefined();
      expect(reporter).not.toHaveBeenCalled();
    });

    it('should report a falsy non-error value and return undefined', () => {
      expect(tracer.trace(false)).toBeUndefined();

      expect(reporter).toHaveBeenCalledTimes(1);
      const [message, fields] = reporter.mock.calls[0];
      expect(message).toBe(
        '# FALSY VALUE PASSED TO trace (value is false, type is boolean) #',
      );
      expect(typeof fields[LogFieldKey.ERROR_STACK]).toBe('string');
    });

    it('should wrap an error with the current call stack', () => {
      const err = new Error('connection refused');

      const traced = tracer.trace(err);

      expect(traced).toBeInstanceOf(TracedError);
      if (!(traced instanceof TracedError)) {
        return;
      }
      expect(traced.message).toBe('connection refused');
      expect(traced.cause).toBe(err);
      expect(traced.unwrap()).toBe(err);
      expect(traced.typeName()).toBe('Error');
      expect(traced.callStack).toContain('traced-error.spec');
      expect(traced.callStack.startsWith('Error')).toBe(false);
    });

    it('should not wrap twice', () => {
      const first = tracer.trace(new Error('boom'));

      expect(tracer.trace(first)).toBe(first);

      const outer = new Error('while saving', { cause: first });
      expect(tracer.trace(outer)).toBe(outer);
      expect(getTracedError(outer)).toBe(first);
    });

    it('should hand inhibited errors back unchanged', () => {
      inhibitSet.inhibit(NotFoundError);
      const err = new NotFoundError('no such row');

      const result = tracer.trace(err);

      expect(result).toBe(err);
      expect(getTracedError(result)).toBeUndefined();
    });

    it('should report at once when logImmediately is set', () => {
      tracer.logImmediately = true;

      const traced = tracer.trace(new Error('disk full'));

      expect(reporter).toHaveBeenCalledTimes(1);
      const [message, fields] = reporter.mock.calls[0];
      expect(message).toBe('ERROR');
      expect(fields[LogFieldKey.ERROR_MESSAGE]).toBe('disk full');
      expect(traced).toBeInstanceOf(TracedError);
      if (traced instanceof TracedError) {
        expect(fields[LogFieldKey.ERROR_STACK]).toBe(traced.callStack);
      }
    });

    it('should not report traced or inhibited errors when logImmediately is set', () => {
      tracer.logImmediately = true;
      inhibitSet.inhibit(NotFoundError);

      tracer.trace(new NotFoundError());
      const traced = tracer.trace(new Error('once'));
      tracer.trace(traced);

      expect(reporter).toHaveBeenCalledTimes(1);
    });
  });
});

describe('TracedError', () => {
  it('should describe itself with its call stack', () => {
    const traced = new TracedError(new RangeError('out of range'), 'at somewhere');
    const fields: LogFields = {};

    traced.setLogFields(fields);

    expect(fields).toEqual({ [LogFieldKey.ERROR_STACK]: 'at somewhere' });
    expect(traced.name).toBe('TracedError');
    expect(traced.typeName()).toBe('RangeError');
  });

  it('should take the message of a string cause', () => {
    expect(new TracedError('plain failure', '').message).toBe('plain failure');
  });
});

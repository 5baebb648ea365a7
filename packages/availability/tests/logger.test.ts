import { describe, expect, test, vi } from 'vitest';
import { createLogger, noopLogger } from '../src/logger.js';

function fakeSink() {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('createLogger', () => {
	test('writes at or above the level, with a prefix', () => {
		const sink = fakeSink();
		const logger = createLogger({ level: 'info', sink });

		logger.debug('hidden');
		logger.info('loaded', 3);
		logger.error('failed');

		expect(sink.debug).not.toHaveBeenCalled();
		expect(sink.info).toHaveBeenCalledWith('[freeslot] loaded', 3);
		expect(sink.error).toHaveBeenCalledWith('[freeslot] failed');
	});

	test('defaults to warn', () => {
		const sink = fakeSink();
		const logger = createLogger({ sink, prefix: '[test]' });

		logger.info('hidden');
		logger.warn('careful');

		expect(sink.info).not.toHaveBeenCalled();
		expect(sink.warn).toHaveBeenCalledWith('[test] careful');
	});

	test('silent writes nothing', () => {
		const sink = fakeSink();
		createLogger({ level: 'silent', sink }).error('hidden');
		expect(sink.error).not.toHaveBeenCalled();
	});
});

describe('noopLogger', () => {
	test('accepts calls without output', () => {
		expect(() => noopLogger.warn('ignored')).not.toThrow();
	});
});

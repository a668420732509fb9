import { expect } from 'chai';
import Pino from 'pino';
import { appendCustomKeys, loggerOptions } from './logger';

function captureLogger() {
	const lines: string[] = [];
	const testLogger = Pino({ ...loggerOptions, level: 'info' }, { write: (line: string) => lines.push(line) });
	const entries = (): Record<string, unknown>[] => lines.map((line) => JSON.parse(line));
	return { testLogger, entries };
}

describe('logger', () => {
	describe('appendCustomKeys', () => {
		it('should append the custom keys to the message', () => {
			expect(appendCustomKeys('Converting arguments', { functionName: 'get_time', args: {} })).to.equal('Converting arguments [functionName, args]');
		});

		it('should not append the standard keys', () => {
			expect(appendCustomKeys('Added function get_time', { err: new Error('x') })).to.equal('Added function get_time');
		});

		it('should leave a message without a merge object unchanged', () => {
			expect(appendCustomKeys('Added function get_time', undefined)).to.equal('Added function get_time');
		});
	});

	describe('output', () => {
		it('should append the custom keys to the logged message', () => {
			const { testLogger, entries } = captureLogger();
			testLogger.info({ functionName: 'get_time' }, 'Converting arguments');

			const [entry] = entries();
			expect(entry.msg).to.equal('Converting arguments [functionName]');
			expect(entry.functionName).to.equal('get_time');
			expect(entry.severity).to.equal('INFO');
		});

		it('should log a message without a merge object as it is', () => {
			const { testLogger, entries } = captureLogger();
			testLogger.info('Added function get_time');
			expect(entries()[0].msg).to.equal('Added function get_time');
		});

		it('should add the stack trace of an error', () => {
			const { testLogger, entries } = captureLogger();
			testLogger.error({ err: new Error('boom') }, 'Conversion failed');

			const [entry] = entries();
			expect(entry.msg).to.equal('Conversion failed');
			expect(entry.severity).to.equal('ERROR');
			expect(entry.stack_trace).to.be.a('string').and.match(/^Error: boom/);
		});
	});
});

#!/usr/bin/env npx tsx
/**
 * Generate a quiz against the configured LLM provider
 *
 * Runs the same prompt, parsing and rendering as POST /quiz, and writes the
 * raw reply next to the parsed items so prompt changes can be checked by hand.
 *
 * Usage:
 *   npx tsx scripts/run-quiz-generation.ts --subject <subject> [options]
 *
 * Environment (.env):
 *   LLM_PROVIDER        openai (default), anthropic or mock
 *   OPENAI_API_KEY      Required for openai
 *   ANTHROPIC_API_KEY   Required for anthropic
 *
 * Options:
 *   --subject <name>   Quiz subject (required)
 *   --level <name>     Learning level (default: Beginner)
 *   --count <n>        Number of questions (default: 5)
 *   --topic <name>     Narrow the quiz to one topic (optional)
 *   --language <name>  Language of the questions (optional)
 *   --output <path>    Output file (default: outputs/quiz-run.json)
 *   --html             Also write the HTML quiz next to the output file
 *   --help, -h         Show help
 */

import 'dotenv/config';
import {existsSync, mkdirSync, writeFileSync} from 'node:fs';
import {dirname} from 'node:path';
import {createLLMProvider} from '../src/adapters/createLLMProvider';
import {loadConfig} from '../src/config';
import {QuizService} from '../src/domain/quiz/QuizService';
import {parseQuizResponse} from '../src/domain/quiz/prompts';
import type {ILLMProvider, LLMChatOptions, LLMMessage, LLMResponse} from '../src/ports';
import {getArg, hasFlag} from './lib/args';

/**
 * Wraps a provider to keep the raw replies and token usage
 */
class RecordingProvider implements ILLMProvider {
	readonly replies: string[] = [];
	readonly usage = {inputTokens: 0, outputTokens: 0};

	constructor(private inner: ILLMProvider) {}

	async chat(messages: LLMMessage[], options?: LLMChatOptions): Promise<LLMResponse> {
		const response = await this.inner.chat(messages, options);
		this.replies.push(response.content);
		this.usage.inputTokens += response.usage?.inputTokens ?? 0;
		this.usage.outputTokens += response.usage?.outputTokens ?? 0;
		return response;
	}

	getProviderName(): string {
		return this.inner.getProviderName();
	}

	getModelName(): string {
		return this.inner.getModelName();
	}

	estimateTokens(text: string): number {
		return this.inner.estimateTokens(text);
	}
}

function printHelp(): void {
	console.error('Usage: npx tsx scripts/run-quiz-generation.ts --subject <subject> [options]');
	console.error('');
	console.error('Options:');
	console.error('  --subject <name>   Quiz subject (required)');
	console.error('  --level <name>     Learning level (default: Beginner)');
	console.error('  --count <n>        Number of questions (default: 5)');
	console.error('  --topic <name>     Narrow the quiz to one topic');
	console.error('  --language <name>  Language of the questions');
	console.error('  --output <path>    Output file (default: outputs/quiz-run.json)');
	console.error('  --html             Also write the HTML quiz');
}

async function main() {
	const args = process.argv.slice(2);

	if (hasFlag(args, '--help', '-h')) {
		printHelp();
		process.exit(0);
	}

	const subject = getArg(args, '--subject');
	if (!subject) {
		console.error('Error: --subject is required');
		printHelp();
		process.exit(1);
	}

	const level = getArg(args, '--level') ?? 'Beginner';
	const numQuestions = parseInt(getArg(args, '--count') ?? '5', 10);
	const outputPath = getArg(args, '--output') ?? 'outputs/quiz-run.json';
	const writeHtml = hasFlag(args, '--html');

	const config = loadConfig();
	const provider = new RecordingProvider(createLLMProvider(config.llm));
	const service = new QuizService(provider, {
		temperature: config.llm.temperature,
		timeoutMs: config.llm.timeoutMs,
	});

	console.error(`Provider: ${provider.getProviderName()} (${provider.getModelName()})`);
	console.error(`Generating ${numQuestions} ${level} questions on ${subject}...`);

	const startTime = Date.now();
	const result = await service.generate({
		subject,
		level,
		numQuestions,
		topic: getArg(args, '--topic'),
		language: getArg(args, '--language'),
		revealFormat: writeHtml,
	});
	const durationMs = Date.now() - startTime;

	const rawReply = provider.replies[0] ?? '';
	const output = {
		timestamp: Date.now(),
		provider: provider.getProviderName(),
		model: provider.getModelName(),
		request: {subject, level, numQuestions},
		durationMs,
		usage: provider.usage,
		rawReply,
		skipped: parseQuizResponse(rawReply).skipped,
		fallback: result.fallback,
		message: result.message,
		quiz: result.quiz,
	};

	const outputDir = dirname(outputPath);
	if (!existsSync(outputDir)) {
		mkdirSync(outputDir, {recursive: true});
	}
	writeFileSync(outputPath, JSON.stringify(output, null, 2));

	if (writeHtml && result.formattedQuiz) {
		const htmlPath = outputPath.replace(/\.json$/, '') + '.html';
		writeFileSync(htmlPath, result.formattedQuiz);
		console.error(`HTML quiz saved to: ${htmlPath}`);
	}

	// Print summary
	console.error('');
	console.error('=== Complete ===');
	console.error(`Duration: ${(durationMs / 1000).toFixed(2)}s`);
	console.error(`Questions: ${result.quiz.length}/${numQuestions}${result.fallback ? ' (fallback)' : ''}`);
	console.error(`Skipped blocks: ${output.skipped.length}`);
	for (const {reason} of output.skipped) {
		console.error(`  - ${reason}`);
	}
	console.error(`Tokens: ${provider.usage.inputTokens} in / ${provider.usage.outputTokens} out`);
	console.error(`Output saved to: ${outputPath}`);
}

main().catch((err) => {
	console.error('Error:', err.message);
	console.error(err.stack);
	process.exit(1);
});

export * from './judge.types';
export { CORRECTNESS_SYSTEM_PROMPT, buildCorrectnessPrompt } from './correctness.prompt';
export { OpenAIJudge, parseVerdict, type CompletionFn, type OpenAIJudgeOptions } from './openai.judge';

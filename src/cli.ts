import { select } from '@inquirer/prompts';
import chalk from 'chalk';
import { z } from 'zod';

const API_URL = process.env.API_URL ?? 'http://localhost:3000';
const USER_ID = process.env.STUDY_USER_ID ?? '1';
const LOCALE = process.env.STUDY_LOCALE ?? 'en';

const Word = z.object({
  id: z.number(),
  word: z.string(),
  phoneticClues: z.string(),
  example: z.string(),
  translation: z.string(),
  exampleTranslation: z.string(),
  easyPeriod: z.number(),
  normalPeriod: z.number(),
  hardPeriod: z.number(),
  extraHardPeriod: z.number(),
});
type Word = z.infer<typeof Word>;

const ErrorBody = z.object({ error: z.string() });

async function call(path: string, init: { method?: string; body?: string } = {}): Promise<unknown> {
  const res = await fetch(`${API_URL}${path}`, {
    ...init,
    headers: { 'Content-Type': 'application/json', 'x-user-id': USER_ID },
  });
  const data: unknown = await res.json();
  if (!res.ok) {
    const parsed = ErrorBody.safeParse(data);
    throw new Error(parsed.success ? parsed.data.error : `request failed with ${res.status}`);
  }
  return data;
}

// Hide the word inside its example sentence
function createCloze(sentence: string, target: string): string {
  if (!sentence.includes(target)) return sentence;
  return sentence.split(target).join(chalk.bold.underline('______'));
}

async function review(word: Word): Promise<number> {
  console.clear();
  console.log(chalk.dim('--------------------------------------------------'));
  console.log(chalk.yellow.italic(`"${word.exampleTranslation}"`));
  console.log('');
  console.log(createCloze(word.example, word.word));
  console.log(chalk.dim('--------------------------------------------------'));

  await select({ message: 'Ready?', choices: [{ name: 'Show answer', value: true }] });
  console.log(`${chalk.bold(word.word)} ${chalk.dim(`(${word.phoneticClues})`)}: ${word.translation}`);

  return select({
    message: 'How hard was it?',
    choices: [
      { name: chalk.green(`Easy (${word.easyPeriod}d)`), value: word.easyPeriod },
      { name: `Normal (${word.normalPeriod}d)`, value: word.normalPeriod },
      { name: chalk.yellow(`Hard (${word.hardPeriod}d)`), value: word.hardPeriod },
      { name: chalk.red(`Extra hard (${word.extraHardPeriod}d)`), value: word.extraHardPeriod },
    ],
  });
}

async function startSession() {
  const session = z.array(Word).parse(await call(`/words?newCount=10&oldCount=10&locale=${LOCALE}`));
  if (session.length === 0) {
    console.log(chalk.green('Nothing to study.'));
    return;
  }

  const results: { wordId: number; period: number }[] = [];
  for (const word of session) {
    results.push({ wordId: word.id, period: await review(word) });
  }

  await call('/words/results', { method: 'POST', body: JSON.stringify({ results }) });
  console.log(chalk.green(`\n✅ Session done, ${results.length} words scheduled.`));
}

startSession().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exitCode = 1;
});

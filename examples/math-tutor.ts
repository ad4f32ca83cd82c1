import { z } from 'zod';
import {
  AssistantSession,
  ToolRegistry,
  createClientFromEnv,
  getResponse,
  prettyPrint,
  showJson,
} from '../src/index.js';

const quizSchema = z.object({
  title: z.string(),
  questions: z.array(
    z.object({
      question_text: z.string(),
      question_type: z.enum(['MULTIPLE_CHOICE', 'FREE_RESPONSE']).optional(),
      choices: z.array(z.string()).optional(),
    })
  ),
});

const quizParameters = {
  type: 'object',
  properties: {
    title: { type: 'string' },
    questions: {
      type: 'array',
      description: 'An array of questions, each with a title and potentially options (if multiple choice).',
      items: {
        type: 'object',
        properties: {
          question_text: { type: 'string' },
          question_type: { type: 'string', enum: ['MULTIPLE_CHOICE', 'FREE_RESPONSE'] },
          choices: { type: 'array', items: { type: 'string' } },
        },
        required: ['question_text'],
      },
    },
  },
  required: ['title', 'questions'],
};

// Canned answers stand in for a student at the keyboard.
const tools = new ToolRegistry().register({
  name: 'display_quiz',
  description:
    "Displays a quiz to the student, and returns the student's response. A single quiz can have multiple questions.",
  parameters: quizParameters,
  schema: quizSchema,
  handler: (quiz) => {
    console.log(`Quiz: ${quiz.title}`);
    return quiz.questions.map((q) => (q.question_type === 'MULTIPLE_CHOICE' ? 'a' : "I don't know."));
  },
});

async function main(): Promise<void> {
  const client = createClientFromEnv();
  const context = client.context();

  const tutor = await AssistantSession.create(
    context,
    {
      name: 'Math Tutor',
      instructions: 'You are a personal math tutor. Answer questions briefly, in a sentence or less.',
      model: 'gpt-4o',
      tools: [{ type: 'code_interpreter' }],
    },
    tools
  );
  showJson(await tutor.refresh());

  const outcomes = await tutor.askAll([
    'I need to solve the equation `3x + 11 = 14`. Can you help me?',
    'Could you explain linear algebra to me?',
    "I don't like math. What can I do?",
  ]);
  for (const outcome of outcomes) {
    if (outcome.status === 'fulfilled') {
      prettyPrint(outcome.exchange.messages);
    } else {
      console.error(`"${outcome.text}" failed: ${outcome.error.message}`);
    }
  }

  const first = outcomes[0];
  if (first?.status === 'fulfilled') {
    const turn = await tutor.followUp(first.exchange.thread, 'Thank you!');
    prettyPrint(turn.messages);
    prettyPrint(await getResponse(context, first.exchange.thread, { order: 'desc' }));
  }

  const quiz = await tutor.ask('Make a quiz with 2 questions: One open ended, one multiple choice.');
  prettyPrint(quiz.messages);

  await client.assistants.delete(tutor.assistantId);
}

main().catch(console.error);

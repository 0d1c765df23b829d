import type { QuestionAnswer, UserQuestion } from '@squadron/schema';

/** Prompt sent on resume when the operator answered nothing. */
export const EMPTY_ANSWER_PROMPT = 'Continue';

/**
 * Render operator answers as the prompt for the resumed session.
 *
 * One clause per answered question, in question order:
 * free text wins over selected options, unanswered questions are skipped.
 */
export function formatQuestionAnswers(
  questions: readonly UserQuestion[],
  answers: readonly QuestionAnswer[]
): string {
  const clauses: string[] = [];

  questions.forEach((question, index) => {
    const answer = answers.find((candidate) => candidate.questionIndex === index);
    if (!answer) return;

    const header = question.header.trim() || question.question;
    const customText = answer.customText?.trim();
    if (customText) {
      clauses.push(`For ${header}: ${customText}`);
    } else if (answer.selectedOptions.length > 0) {
      clauses.push(`For ${header}: I choose ${answer.selectedOptions.join(', ')}`);
    }
  });

  if (clauses.length === 0) return EMPTY_ANSWER_PROMPT;
  return `${clauses.join('. ')}.`;
}

export function formatPlanApproval(): string {
  return 'yes';
}

export function formatPlanRejection(feedback?: string): string {
  const trimmed = feedback?.trim();
  return trimmed ? `no, ${trimmed}` : 'no';
}

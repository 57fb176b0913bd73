import { z } from 'zod';
import { presentModal, type ModalTask } from './modalTask';
import type { HostLoop } from './hostLoop';

export type PromptChoice<T> = {
  id: string;
  label: string;
  value: T;
};

export type PromptRequest<T> = {
  title: string;
  body?: string;
  choices: Array<PromptChoice<T>>;
  cancelValue: T;
};

// What the presenter sees; choice values stay with the caller.
export type PromptView = {
  title: string;
  body: string;
  choices: Array<{ id: string; label: string }>;
};

export type PromptHandle = {
  choose: (choiceId: string) => void;
  cancel: () => void;
};

export interface PromptPresenter {
  present(view: PromptView, handle: PromptHandle): void;
}

const PromptViewSchema = z
  .object({
    title: z.string().min(1),
    body: z.string().default(''),
    choices: z.array(z.object({ id: z.string().min(1), label: z.string() })).min(1),
  })
  .refine((view) => new Set(view.choices.map((choice) => choice.id)).size === view.choices.length, {
    message: 'choice ids must be unique',
    path: ['choices'],
  });

/**
 * Presents a prompt and blocks (via the host loop) until the presenter reports a choice.
 * Cancelling, or choosing an id the request never offered, yields `cancelValue`.
 */
export const presentPrompt = <T>(host: HostLoop, presenter: PromptPresenter, request: PromptRequest<T>): T => {
  const view = PromptViewSchema.parse({
    title: request.title,
    body: request.body,
    choices: request.choices.map(({ id, label }) => ({ id, label })),
  });

  const outcome = presentModal<T>(
    host,
    (task: ModalTask<T>) => {
      presenter.present(view, {
        choose: (choiceId) => {
          const choice = request.choices.find((candidate) => candidate.id === choiceId);
          if (!choice) {
            console.warn(`[modal] prompt "${view.title}" has no choice ${choiceId}; treating as cancel`);
            task.dismiss();
            return;
          }
          task.complete(choice.value);
        },
        cancel: () => {
          task.dismiss();
        },
      });
    },
    `prompt:${view.title}`,
  );

  return outcome.status === 'completed' ? outcome.value : request.cancelValue;
};

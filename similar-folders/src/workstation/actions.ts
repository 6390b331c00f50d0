/**
 * What the operator can do with a presented pair
 */
export type ResolutionAction =
  | 'merge-up'
  | 'merge-down'
  | 'delete-up'
  | 'delete-down'
  | 'skip'
  | 'quit';

const ACTION_TOKENS: ReadonlyMap<string, ResolutionAction> = new Map<string, ResolutionAction>([
  ['mu', 'merge-up'],
  ['md', 'merge-down'],
  ['du', 'delete-up'],
  ['dd', 'delete-down'],
  ['s', 'skip'],
  ['q', 'quit'],
  ['merge-up', 'merge-up'],
  ['merge-down', 'merge-down'],
  ['delete-up', 'delete-up'],
  ['delete-down', 'delete-down'],
  ['skip', 'skip'],
  ['quit', 'quit']
]);

/**
 * Maps operator input to an action
 * @returns The action, or undefined for unrecognized input
 */
export function parseAction(input: string): ResolutionAction | undefined {
  return ACTION_TOKENS.get(input.trim().toLowerCase());
}

export const ACTION_PROMPT =
  '[mu] merge secondary into primary  [md] merge primary into secondary\n' +
  '[du] delete primary  [dd] delete secondary  [s] skip  [q] quit\n' +
  'Action: ';

import type { Row } from '../../../src/types/data-model.js';

export function userRows(): Row[] {
  return [
    { id: 1, name: 'Grace', email: 'grace@example.com', team: 'core' },
    { id: 2, name: 'Ada', email: 'ada@example.com', team: 'core' },
    { id: 3, name: 'Alan', email: 'alan@example.com', team: 'labs' },
  ];
}

// Stable types

import type { Audited, Id } from './common.js';
import type { ActivationStatus } from './statuses.js';

export type Stable = Audited & {
  id: Id;
  type: 'stable';
  name: string;
  status: ActivationStatus;
};

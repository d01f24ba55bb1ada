// Title and championship types

import type { Audited, Id, Timestamp } from './common.js';
import type { ChampionRef } from './refs.js';
import type { ActivationStatus } from './statuses.js';

export type Title = Audited & {
  id: Id;
  type: 'title';
  name: string;
  status: ActivationStatus;
};

/**
 * A single reign. At most one row per title has `lostAt === null`.
 */
export type TitleChampionship = {
  id: Id;
  titleId: Id;
  champion: ChampionRef;
  wonAt: Timestamp;
  lostAt: Timestamp | null;
};

// Transition vocabulary

/**
 * Transitions available to employable roster members.
 */
export type EmploymentTransition =
  | 'employ'
  | 'release'
  | 'suspend'
  | 'reinstate'
  | 'injure'
  | 'clearInjury'
  | 'retire'
  | 'unretire';

/**
 * Transitions available to titles and stables.
 */
export type ActivationTransition = 'activate' | 'deactivate' | 'retire' | 'unretire';

export type Transition = EmploymentTransition | ActivationTransition;

/**
 * Validator families. Wrestlers, referees and managers share the individual
 * rules; tag teams, titles and stables each carry their own.
 */
export type TransitionFamily = 'individual' | 'tag_team' | 'title' | 'stable';


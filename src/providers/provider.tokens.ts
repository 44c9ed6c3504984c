/** Model that writes the user-facing answers. */
export const ANSWER_MODEL = 'ANSWER_MODEL';

/** Model used for intent classification and topic resolution. */
export const ROUTING_MODEL = 'ROUTING_MODEL';

export const EMBEDDER = 'EMBEDDER';

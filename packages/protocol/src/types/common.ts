// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * UUID string identifier
 */
export type Id = string;

/**
 * Anything that records when it was created and last touched.
 */
export type Audited = {
  createdAt: Timestamp;
  updatedAt: Timestamp;
};

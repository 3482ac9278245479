// Field constraints shared by the entity schemas and the database tables

export const CONSTRAINTS = {
  PROJECT: {
    TITLE_MAX_LENGTH: 64,
    DESCRIPTION_MAX_LENGTH: 256,
  },
  BOARD: {
    TITLE_MAX_LENGTH: 64,
  },
  LABEL: {
    TITLE_MAX_LENGTH: 32,
  },
  LIST: {
    TITLE_MAX_LENGTH: 64,
  },
  TASK: {
    TITLE_MAX_LENGTH: 64,
    DESCRIPTION_MAX_LENGTH: 512,
    STORY_POINTS_MIN: 0,
    STORY_POINTS_MAX: 100,
    STORY_POINTS_STEP: 5,
  },
  SLUG: {
    MAX_LENGTH: 50,
  },
} as const;

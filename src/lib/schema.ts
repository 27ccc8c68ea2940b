/** Tables for accounts, media entries and ratings. Safe to run on every start. */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS accounts (
  id            TEXT PRIMARY KEY,
  username      TEXT NOT NULL UNIQUE,
  email         TEXT NOT NULL UNIQUE,
  password_hash TEXT NOT NULL,
  rating_count  INTEGER NOT NULL DEFAULT 0 CHECK (rating_count >= 0),
  last_login    TEXT,
  created_at    TEXT NOT NULL,
  updated_at    TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS media_entries (
  id            TEXT PRIMARY KEY,
  title         TEXT NOT NULL,
  description   TEXT,
  category      TEXT NOT NULL
                CHECK (category IN ('game', 'video', 'artwork', 'music')),
  thumbnail_url TEXT,
  content_url   TEXT NOT NULL,
  creator_id    TEXT NOT NULL,
  created_at    TEXT NOT NULL,
  updated_at    TEXT NOT NULL,
  CONSTRAINT fk_media_creator FOREIGN KEY (creator_id)
    REFERENCES accounts(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS ratings (
  id         TEXT PRIMARY KEY,
  media_id   TEXT NOT NULL,
  account_id TEXT NOT NULL,
  score      INTEGER NOT NULL CHECK (score >= 1 AND score <= 5),
  comment    TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  CONSTRAINT fk_rating_media FOREIGN KEY (media_id)
    REFERENCES media_entries(id) ON DELETE CASCADE,
  CONSTRAINT fk_rating_account FOREIGN KEY (account_id)
    REFERENCES accounts(id) ON DELETE CASCADE,
  CONSTRAINT unique_account_media_rating UNIQUE (media_id, account_id)
);

CREATE INDEX IF NOT EXISTS idx_media_category   ON media_entries(category);
CREATE INDEX IF NOT EXISTS idx_media_creator    ON media_entries(creator_id);
CREATE INDEX IF NOT EXISTS idx_media_created_at ON media_entries(created_at);
CREATE INDEX IF NOT EXISTS idx_ratings_media    ON ratings(media_id);
CREATE INDEX IF NOT EXISTS idx_ratings_account  ON ratings(account_id);
`;

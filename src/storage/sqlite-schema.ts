export const STORE_SCHEMA_VERSION = 1 as const;

export const PROFILE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS user_profile (
  id INTEGER PRIMARY KEY,
  chat_key TEXT NOT NULL UNIQUE,
  username TEXT,
  first_name TEXT,
  last_name TEXT,
  english_level TEXT NOT NULL DEFAULT 'B1',
  created_at TEXT NOT NULL,
  last_active TEXT NOT NULL,
  total_sessions INTEGER NOT NULL DEFAULT 0,
  total_messages INTEGER NOT NULL DEFAULT 0,
  voice_messages INTEGER NOT NULL DEFAULT 0,
  corrected_errors INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS user_preferences (
  id INTEGER PRIMARY KEY,
  chat_key TEXT NOT NULL UNIQUE,
  topics_of_interest TEXT NOT NULL DEFAULT '[]',
  learning_goals TEXT,
  preferred_response_style TEXT NOT NULL DEFAULT 'friendly',
  practice_focus TEXT,
  difficulty_preference TEXT NOT NULL DEFAULT 'adaptive',
  FOREIGN KEY (chat_key) REFERENCES user_profile (chat_key)
);

CREATE TABLE IF NOT EXISTS learning_progress (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  chat_key TEXT NOT NULL,
  skill_area TEXT NOT NULL,
  level_assessment TEXT NOT NULL,
  progress_score REAL NOT NULL DEFAULT 0.0,
  last_practiced TEXT NOT NULL,
  FOREIGN KEY (chat_key) REFERENCES user_profile (chat_key)
);
`;

export const CONVERSATION_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS messages (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  chat_key TEXT NOT NULL,
  session_id TEXT NOT NULL,
  message_type TEXT NOT NULL CHECK (message_type IN ('user', 'assistant', 'system')),
  content TEXT NOT NULL,
  original_content TEXT NOT NULL,
  is_voice INTEGER NOT NULL DEFAULT 0,
  voice_duration REAL,
  has_errors INTEGER NOT NULL DEFAULT 0,
  grammar_corrections TEXT,
  vocabulary_suggestions TEXT,
  confidence_score REAL,
  response_time REAL,
  created_at TEXT NOT NULL,
  message_context TEXT
);

CREATE INDEX IF NOT EXISTS idx_messages_created ON messages (created_at, id);
CREATE INDEX IF NOT EXISTS idx_messages_session ON messages (session_id);

CREATE TABLE IF NOT EXISTS conversation_sessions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  chat_key TEXT NOT NULL,
  session_id TEXT NOT NULL UNIQUE,
  session_start TEXT NOT NULL,
  session_end TEXT NOT NULL,
  messages_count INTEGER NOT NULL DEFAULT 0
);
`;

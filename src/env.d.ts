/**
 * Environment variable type definitions
 */

declare global {
  namespace NodeJS {
    interface ProcessEnv {
      NODE_ENV?: 'development' | 'production' | 'test';
      LOG_LEVEL?: string;

      // LLM provider
      OPENAI_API_KEY?: string;
      OPENAI_BASE_URL?: string;
      OPENAI_MODEL?: string;
      LLM_TIMEOUT_MS?: string;

      // HTTP server
      PORT?: string;
      HOST?: string;
      RATE_LIMIT_WINDOW_MS?: string;
      RATE_LIMIT_MAX_REQUESTS?: string;
      JSON_BODY_LIMIT?: string;
      STREAM_MAX_FINDINGS?: string;
      ALLOWED_ORIGINS?: string;
    }
  }
}

export {};

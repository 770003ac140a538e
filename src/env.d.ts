// Environment variable types for the analyzer. Kept free of top-level imports/exports so the
// `NodeJS.ProcessEnv` augmentation below stays global.

declare namespace NodeJS {
    interface ProcessEnv {
        API_KEY?: string;
        GEMINI_MODEL?: string;
        NODE_ENV?: 'development' | 'production' | 'test';
        SUPABASE_URL?: string;
        SUPABASE_ANON_KEY?: string;
    }
}

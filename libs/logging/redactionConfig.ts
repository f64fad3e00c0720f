/**
 * Centralized Redaction Configuration
 * Document bodies must never reach the log stream, only their identifiers.
 */
export const REDACT_KEYS = [
    // Document payloads (Root and Nested)
    'content', '*.content',
    'newContent', '*.newContent',
    'initialContent', '*.initialContent',

    // Credentials, should a caller attach them to a log context
    'password', '*.password',
    'token', '*.token',
    'secret', '*.secret'
];

export const REDACT_CENSOR = '[REDACTED]';

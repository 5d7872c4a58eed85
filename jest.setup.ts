/**
 * Jest global setup: set env vars before any module is imported.
 */
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
process.env.WATERMARK_FONT_FILE = '/nonexistent/fonts/preferred-test.ttf';
process.env.WATERMARK_FALLBACK_FONT_FILE = '/nonexistent/fonts/alternate-test.ttf';

// Jest setup: plain text output and a fixed time zone for rendered dates.
// Runs before any test module (and therefore chalk) is loaded.

process.env.FORCE_COLOR = '0';
process.env.TZ = 'UTC';

export {};

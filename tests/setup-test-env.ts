/**
 * Test Environment Setup
 * Runs before every test file, ahead of any module under test
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';

// Keep the real data directory out of unit tests unless a test opts in
delete process.env.JOB_REQUIREMENTS_PATH;
delete process.env.SKILL_TAXONOMY_PATH;
delete process.env.ROADMAP_ORDER;

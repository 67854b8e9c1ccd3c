// Test setup file
import dotenv from 'dotenv';

// Load environment variables from .env.test if it exists, otherwise use defaults
dotenv.config({ path: '.env.test' });

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'error';
process.env.SPELLING_LANGUAGE = process.env.SPELLING_LANGUAGE || 'en';

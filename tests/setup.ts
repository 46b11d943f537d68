// Jest setup file
import 'reflect-metadata';
import { jest } from '@jest/globals';

// Set test environment before any module reads the configuration
process.env.NODE_ENV = 'test';
process.env.JWT_SECRET = 'test-secret';
process.env.JWT_ISSUER = 'catalog-platform';
process.env.ALLOWED_ORIGINS = 'http://localhost:3000';

// Global test timeout
jest.setTimeout(30000);

/**
 * Configuration Tests
 *
 * These tests define the contract for environment loading:
 * - Defaults when nothing is set
 * - Tighter limits on serverless deployments
 * - CONFIG_INVALID naming every bad variable
 *
 * The implementation lives in: src/config.ts
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { captureError } from './helpers.js';

describe('Configuration', () => {
  describe('Defaults', () => {
    it('should run as a development server without any variables', () => {
      const config = loadConfig({});

      expect(config.environment).toBe('development');
      expect(config.debug).toBe(false);
      expect(config.is_vercel).toBe(false);
      expect(config.transport).toBe('http');
      expect(config.server).toMatchObject({
        host: '0.0.0.0',
        port: 8000,
        max_active_requests: 10,
        request_timeout_ms: 30_000,
        request_cleanup_delay_ms: 300_000,
      });
      expect(config.gemini.model).toBe('gemini-2.0-flash');
      expect(config.gemini.api_key).toBeUndefined();
      expect(config.rate_limit.per_minute).toBe(30);
      expect(config.logging.level).toBe('debug');
    });

    it('should treat empty strings as unset', () => {
      const config = loadConfig({ GEMINI_API_KEY: '', PORT: '  ' });
      expect(config.gemini.api_key).toBeUndefined();
      expect(config.server.port).toBe(8000);
    });
  });

  describe('Deployment Profiles', () => {
    it('should tighten limits on Vercel', () => {
      const config = loadConfig({ ENVIRONMENT: 'Production', VERCEL: '1', GEMINI_API_KEY: 'test-secret' });

      expect(config.environment).toBe('production');
      expect(config.is_vercel).toBe(true);
      expect(config.server.max_active_requests).toBe(5);
      expect(config.server.request_timeout_ms).toBe(8_000);
      expect(config.server.request_cleanup_delay_ms).toBe(60_000);
      expect(config.gemini.timeout_ms).toBe(8_000);
      expect(config.gemini.api_key).toBe('test-secret');
      expect(config.logging.level).toBe('info');
    });

    it('should read DEBUG flags case-insensitively', () => {
      expect(loadConfig({ DEBUG: 'YES' }).debug).toBe(true);
      expect(loadConfig({ DEBUG: '1' }).debug).toBe(true);
      expect(loadConfig({ DEBUG: 'no' }).debug).toBe(false);
    });

    it('should let LOG_LEVEL override the environment default', () => {
      expect(loadConfig({ ENVIRONMENT: 'production', LOG_LEVEL: 'WARN' }).logging.level).toBe('warn');
    });
  });

  describe('Overrides', () => {
    it('should merge nested overrides over the environment', () => {
      const config = loadConfig({ ENVIRONMENT: 'test' }, { debug: true, server: { request_timeout_ms: 50 } });

      expect(config.debug).toBe(true);
      expect(config.server.request_timeout_ms).toBe(50);
      expect(config.server.port).toBe(8000);
    });

    it('should freeze the configuration and its sections', () => {
      const config = loadConfig({ ENVIRONMENT: 'test' }, { server: { request_timeout_ms: 50 } });

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.server)).toBe(true);
      expect(Object.isFrozen(config.gemini)).toBe(true);
    });
  });

  describe('Validation', () => {
    it('should name every invalid variable', () => {
      expect(captureError(() => loadConfig({ PORT: 'eighty', TRANSPORT: 'ftp' }))).toMatchObject({
        code: 'CONFIG_INVALID',
        message: 'Invalid environment configuration: PORT, TRANSPORT',
      });
    });

    it('should reject an unknown environment name', () => {
      expect(captureError(() => loadConfig({ ENVIRONMENT: 'staging' }))).toMatchObject({
        message: 'Invalid environment configuration: ENVIRONMENT',
      });
    });
  });
});

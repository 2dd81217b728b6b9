import { describe, it, expect } from 'vitest';
import {
  BridgeConfigSchema,
  InputSchemaSchema,
  ToolDefinitionSchema,
  ToolHeaderSchema,
  formatIssues,
} from '../../src/config/schema.js';

describe('config schema', () => {
  describe('BridgeConfigSchema', () => {
    it('should apply defaults', () => {
      const config = BridgeConfigSchema.parse({ toolsConfigDir: '/etc/bridge/tools' });

      expect(config).toEqual({
        project: 'default-project',
        hostProjectRoot: '/workspace',
        containerProjectRoot: '/var/www/html',
        toolsConfigDir: '/etc/bridge/tools',
        containerTemplate: 'ddev-{project}-web',
        siteLabel: 'com.ddev.site-name',
        dockerPath: 'docker',
        maxBufferKb: 10240,
      });
    });

    it('should reject relative project roots', () => {
      const result = BridgeConfigSchema.safeParse({ toolsConfigDir: '/tools', hostProjectRoot: 'workspace' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatIssues(result.error)).toBe('hostProjectRoot: Host project root must be an absolute path');
      }
    });

    it('should reject a docker path with shell characters', () => {
      const result = BridgeConfigSchema.safeParse({ toolsConfigDir: '/tools', dockerPath: 'docker; rm' });
      expect(result.success).toBe(false);
    });
  });

  describe('ToolDefinitionSchema', () => {
    it('should default to a command tool', () => {
      const definition = ToolDefinitionSchema.parse({ name: 'drush', command_template: 'drush {command}' });

      expect(definition).toEqual({
        name: 'drush',
        enabled: false,
        type: 'command',
        command_template: 'drush {command}',
        user: 'www-data',
        default_args: {},
        disallowed_commands: [],
        validation_rules: [],
        shell: '/bin/bash',
      });
    });

    it('should apply remote tool defaults', () => {
      const definition = ToolDefinitionSchema.parse({
        name: 'docs',
        type: 'mcp_server',
        server_url: 'https://example.test/mcp',
      });

      expect(definition).toMatchObject({
        type: 'mcp_server',
        forward_args: true,
        timeout: 10,
        auth_token_basic: false,
        verify_ssl: true,
        expose_remote_tools: false,
        expose_proxy_tool: false,
        tool_prefix: '',
        init_timeout: 30,
      });
    });

    it('should reject timeouts longer than a timer can hold', () => {
      const base = { name: 'docs', type: 'mcp_server', server_url: 'https://example.test/mcp' };

      expect(ToolDefinitionSchema.safeParse({ ...base, timeout: 3000000 }).success).toBe(false);
      expect(ToolDefinitionSchema.safeParse({ ...base, init_timeout: 3000000 }).success).toBe(false);
      expect(ToolDefinitionSchema.safeParse({ ...base, timeout: 2147483, init_timeout: 2147483 }).success).toBe(true);
    });

    it('should require a command template for command tools', () => {
      expect(ToolDefinitionSchema.safeParse({ name: 'broken' }).success).toBe(false);
    });

    it('should reject an invalid server url', () => {
      const result = ToolDefinitionSchema.safeParse({ name: 'docs', type: 'mcp_server', server_url: 'not a url' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatIssues(result.error)).toBe('server_url: server_url must be a valid URL');
      }
    });

    it('should reject unknown tool types', () => {
      expect(ToolDefinitionSchema.safeParse({ name: 'x', type: 'lambda' }).success).toBe(false);
    });

    it('should reject validation rules that do not compile', () => {
      const result = ToolDefinitionSchema.safeParse({
        name: 'drush',
        command_template: 'drush',
        validation_rules: [{ pattern: '(' }],
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatIssues(result.error)).toBe(
          'validation_rules.0.pattern: Validation rule pattern is not a valid regular expression'
        );
      }
    });
  });

  describe('InputSchemaSchema', () => {
    it('should fill in missing fields and keep extra ones', () => {
      expect(InputSchemaSchema.parse({ additionalProperties: false })).toEqual({
        type: 'object',
        properties: {},
        additionalProperties: false,
      });
    });
  });

  describe('ToolHeaderSchema', () => {
    it('should treat tools as disabled unless enabled', () => {
      expect(ToolHeaderSchema.parse({ name: 'drush' })).toEqual({ name: 'drush', enabled: false });
    });

    it('should require a name', () => {
      expect(ToolHeaderSchema.safeParse({ enabled: true }).success).toBe(false);
    });
  });
});

/**
 * Zod schema for the policy document (YAML or JSON).
 *
 * Structural validation plus cross-reference checks: every route or tool a
 * role lists must exist in the catalogue, every designated collection
 * operation must exist, and every role key must be a known role.
 *
 * @module policy/policySchema
 */

import { z } from 'zod';
import { ROLES, isRole } from '../types/index.js';

/** `<column> = principal.id` or `<column> = principal.scope.<attribute>`. */
export const SCOPE_TEMPLATE_PATTERN =
  /^\s*([a-z_][a-z0-9_]*)\s*=\s*principal\.(id|scope\.[A-Za-z_][A-Za-z0-9_]*)\s*$/;

const RoleSchema = z.enum(ROLES);

const MaskRuleSchema = z.object({
  field: z.string().min(1),
  strategy: z.enum(['ssn', 'dob', 'account_number', 'redact']),
});

const ScopeTemplateSchema = z
  .string()
  .regex(SCOPE_TEMPLATE_PATTERN, 'must look like "<column> = principal.id" or "<column> = principal.scope.<name>"');

const ResourceSchema = z.object({
  scopes: z.record(z.string(), ScopeTemplateSchema).default({}),
});

const RouteSchema = z.object({
  resource: z.string().min(1).optional(),
  lookup: z.boolean().default(false),
});

const ToolSchema = z.object({
  requiredRoles: z.array(RoleSchema).min(1),
  resource: z.string().min(1).optional(),
  lookup: z.boolean().default(false),
});

const RolePolicySchema = z.object({
  routes: z.array(z.string()).default([]),
  tools: z.array(z.string()).default([]),
  masks: z.array(MaskRuleSchema).default([]),
});

const ROUTE_PATTERN = /^(GET|POST|PUT|PATCH|DELETE) \/\S*$/;

export const PolicyDocumentSchema = z
  .object({
    version: z.string().min(1),
    isolation: z.object({
      minimumSampleSize: z.number().int().min(1).default(30),
      disparityRatioFloor: z.number().gt(0).max(1).default(0.8),
      collectionOperations: z.array(z.string().min(1)).min(1),
      aggregateOperations: z.array(z.string().min(1)).default([]),
    }),
    alerts: z
      .object({
        repeatedDenialThreshold: z.number().int().min(1).default(5),
        repeatedDenialWindowSeconds: z.number().int().min(1).default(300),
      })
      .default({}),
    resources: z.record(z.string(), ResourceSchema).default({}),
    routes: z.record(z.string().regex(ROUTE_PATTERN, 'must be "<METHOD> <path>"'), RouteSchema),
    tools: z.record(z.string(), ToolSchema).default({}),
    roles: z.record(z.string(), RolePolicySchema),
  })
  .superRefine((doc, ctx) => {
    const has = (record: object, key: string) => Object.prototype.hasOwnProperty.call(record, key);

    for (const [resource, definition] of Object.entries(doc.resources)) {
      for (const role of Object.keys(definition.scopes)) {
        if (!isRole(role)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['resources', resource, 'scopes', role],
            message: `unknown role "${role}"`,
          });
        }
      }
    }

    const checkResource = (resource: string | undefined, path: (string | number)[]) => {
      if (resource !== undefined && !has(doc.resources, resource)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: `unknown resource "${resource}"` });
      }
    };
    for (const [pattern, rule] of Object.entries(doc.routes)) {
      checkResource(rule.resource, ['routes', pattern, 'resource']);
    }
    for (const [name, rule] of Object.entries(doc.tools)) {
      checkResource(rule.resource, ['tools', name, 'resource']);
    }

    for (const [role, policy] of Object.entries(doc.roles)) {
      if (!isRole(role)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['roles', role], message: `unknown role "${role}"` });
        continue;
      }
      policy.routes.forEach((route, index) => {
        if (!has(doc.routes, route)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['roles', role, 'routes', index],
            message: `route "${route}" is not in the route catalogue`,
          });
        }
      });
      policy.tools.forEach((tool, index) => {
        if (!has(doc.tools, tool)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['roles', role, 'tools', index],
            message: `tool "${tool}" is not in the tool catalogue`,
          });
        }
      });
    }

    const checkIsolationOperations = (key: 'collectionOperations' | 'aggregateOperations', label: string) => {
      doc.isolation[key].forEach((operation, index) => {
        if (!has(doc.routes, operation) && !has(doc.tools, operation)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['isolation', key, index],
            message: `${label} operation "${operation}" is neither a route nor a tool`,
          });
        }
      });
    };
    checkIsolationOperations('collectionOperations', 'collection');
    checkIsolationOperations('aggregateOperations', 'aggregate');
  });

export type PolicyDocument = z.infer<typeof PolicyDocumentSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}

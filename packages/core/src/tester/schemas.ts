/**
 * Test Specification Schemas
 *
 * Zod schemas for the global test config and suite documents. Every object
 * is strict: an unknown key is a validation error, so a typo in a suite
 * fails loudly instead of silently disabling a check.
 *
 * @module packages/core/tester/schemas
 */

import { z } from 'zod';

// ============================================================================
// Assertions
// ============================================================================

export const JsonAssertionSchema = z
  .object({
    path: z.string(),
    exists: z.boolean().optional(),
    equals: z.unknown(),
    contains: z.string().optional(),
    regex: z.string().optional(),
  })
  .strict();

export type JsonAssertionSpec = z.infer<typeof JsonAssertionSchema>;

export const HeaderAssertionSchema = z
  .object({
    name: z.string().min(1),
    exists: z.boolean().optional(),
    equals: z.string().optional(),
    contains: z.string().optional(),
    regex: z.string().optional(),
  })
  .strict();

export type HeaderAssertionSpec = z.infer<typeof HeaderAssertionSchema>;

// ============================================================================
// Actors
// ============================================================================

export const ActorKindSchema = z.enum(['root', 'namespace', 'database', 'record', 'token', 'headers']);

export type ActorKind = z.infer<typeof ActorKindSchema>;

export const ActorSpecSchema = z
  .object({
    kind: ActorKindSchema,
    username: z.string().optional(),
    usernameEnv: z.string().optional(),
    password: z.string().optional(),
    passwordEnv: z.string().optional(),
    namespace: z.string().optional(),
    namespaceEnv: z.string().optional(),
    database: z.string().optional(),
    databaseEnv: z.string().optional(),
    access: z.string().optional(),
    accessEnv: z.string().optional(),
    params: z.record(z.unknown()).optional(),
    token: z.string().optional(),
    tokenEnv: z.string().optional(),
    headers: z.record(z.string()).default({}),
  })
  .strict();

export type ActorSpec = z.infer<typeof ActorSpecSchema>;

// ============================================================================
// Fixtures
// ============================================================================

export const FixtureSpecSchema = z
  .object({
    name: z.string().optional(),
    actor: z.string().optional(),
    sql: z.string().optional(),
    file: z.string().optional(),
  })
  .strict()
  .superRefine((fixture, ctx) => {
    const hasSql = fixture.sql !== undefined;
    const hasFile = fixture.file !== undefined;
    if (hasSql === hasFile) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'fixture must define exactly one of sql or file',
      });
    }
  });

export type FixtureSpec = z.infer<typeof FixtureSpecSchema>;

// ============================================================================
// Cases
// ============================================================================

const caseBase = {
  name: z.string().min(1),
  tags: z.array(z.string()).default([]),
  actor: z.string().optional(),
};

export const SqlExpectCaseSchema = z
  .object({
    ...caseBase,
    kind: z.literal('sql_expect'),
    sql: z.string(),
    allow: z.boolean().default(true),
    errorContains: z.string().optional(),
    errorCode: z.string().optional(),
    assertions: z.array(JsonAssertionSchema).default([]),
  })
  .strict();

export const PermissionActionSchema = z.enum(['create', 'select', 'update', 'delete', 'query']);

export type PermissionAction = z.infer<typeof PermissionActionSchema>;

export const PermissionRuleSchema = z
  .object({
    action: PermissionActionSchema,
    allow: z.boolean().default(true),
    sql: z.string().optional(),
    errorContains: z.string().optional(),
  })
  .strict();

export type PermissionRuleSpec = z.infer<typeof PermissionRuleSchema>;

export const PermissionsMatrixCaseSchema = z
  .object({
    ...caseBase,
    kind: z.literal('permissions_matrix'),
    table: z.string().min(1),
    recordId: z.string().optional(),
    rules: z.array(PermissionRuleSchema).default([]),
  })
  .strict();

export const SchemaMetadataCaseSchema = z
  .object({
    ...caseBase,
    kind: z.literal('schema_metadata'),
    table: z.string().optional(),
    sql: z.string().optional(),
    contains: z.array(z.string()).default([]),
    assertions: z.array(JsonAssertionSchema).default([]),
  })
  .strict();

export const SchemaBehaviorCaseSchema = z
  .object({
    ...caseBase,
    kind: z.literal('schema_behavior'),
    setupSql: z.array(z.string()).default([]),
    actionSql: z.string(),
    expectSuccess: z.boolean().default(true),
    expectErrorContains: z.string().optional(),
    verifySql: z.string().optional(),
    assertions: z.array(JsonAssertionSchema).default([]),
  })
  .strict();

export const ApiRequestCaseSchema = z
  .object({
    ...caseBase,
    kind: z.literal('api_request'),
    method: z.string().default('GET'),
    path: z.string(),
    expectedStatus: z.number().int().min(100).max(599),
    headers: z.record(z.string()).default({}),
    body: z.unknown(),
    timeoutMs: z.number().int().positive().optional(),
    bodyAssertions: z.array(JsonAssertionSchema).default([]),
    headerAssertions: z.array(HeaderAssertionSchema).default([]),
  })
  .strict();

export const CaseSpecSchema = z.discriminatedUnion('kind', [
  SqlExpectCaseSchema,
  PermissionsMatrixCaseSchema,
  SchemaMetadataCaseSchema,
  SchemaBehaviorCaseSchema,
  ApiRequestCaseSchema,
]);

export type CaseSpec = z.infer<typeof CaseSpecSchema>;
export type CaseKind = CaseSpec['kind'];
export type SqlExpectCase = z.infer<typeof SqlExpectCaseSchema>;
export type PermissionsMatrixCase = z.infer<typeof PermissionsMatrixCaseSchema>;
export type SchemaMetadataCase = z.infer<typeof SchemaMetadataCaseSchema>;
export type SchemaBehaviorCase = z.infer<typeof SchemaBehaviorCaseSchema>;
export type ApiRequestCase = z.infer<typeof ApiRequestCaseSchema>;

// ============================================================================
// Documents
// ============================================================================

export const GlobalDefaultsSchema = z
  .object({
    baseUrl: z.string().optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export const GlobalTestConfigSchema = z
  .object({
    defaults: GlobalDefaultsSchema.default({}),
    actors: z.record(ActorSpecSchema).default({}),
    fixtures: z.array(FixtureSpecSchema).default([]),
  })
  .strict();

export type GlobalTestConfig = z.infer<typeof GlobalTestConfigSchema>;

export const SuiteSpecSchema = z
  .object({
    name: z.string().optional(),
    tags: z.array(z.string()).default([]),
    actors: z.record(ActorSpecSchema).default({}),
    fixtures: z.array(FixtureSpecSchema).default([]),
    cases: z.array(CaseSpecSchema).default([]),
  })
  .strict();

export type SuiteSpec = z.infer<typeof SuiteSpecSchema>;

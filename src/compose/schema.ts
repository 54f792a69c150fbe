/**
 * Zod schema for the compose file shape.
 *
 * Only the keys the validator and generator understand are typed; everything else is
 * kept through `passthrough()` so no declared key is lost. Value-level checks (port
 * grammar, durations, restart policies) are left to the validator, which reports them
 * as issues with a rule name instead of failing the whole parse.
 *
 * Interpolation leaves every substituted value as text, so numeric and boolean fields
 * also accept the textual form and convert it back.
 */

import { z } from 'zod';

const DurationSchema = z.union([z.string(), z.number()]);

const NumberSchema = z.union([
  z.number(),
  z
    .string()
    .trim()
    .regex(/^-?\d+(\.\d+)?$/, 'Expected a number')
    .transform(Number),
]);

const BooleanSchema = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .regex(/^(true|false)$/i, 'Expected true or false')
    .transform((value) => value.toLowerCase() === 'true'),
]);

const StringListSchema = z.array(z.string());

const BuildSchema = z.union([
  z.string(),
  z
    .object({
      context: z.string().optional(),
      dockerfile: z.string().optional(),
      args: z.union([z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])), StringListSchema]).optional(),
      target: z.string().optional(),
    })
    .passthrough(),
]);

const EnvFileSchema = z.union([
  z.string(),
  z.array(
    z.union([
      z.string(),
      z.object({ path: z.string(), required: BooleanSchema.optional() }).passthrough(),
    ]),
  ),
]);

const EnvironmentSchema = z.union([
  z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
  StringListSchema,
]);

const PortEntrySchema = z.union([
  z.string(),
  z.number(),
  z
    .object({
      target: z.union([z.number(), z.string()]),
      published: z.union([z.number(), z.string()]).optional(),
      host_ip: z.string().optional(),
      protocol: z.string().optional(),
      mode: z.string().optional(),
    })
    .passthrough(),
]);

const VolumeEntrySchema = z.union([
  z.string(),
  z
    .object({
      type: z.string().optional(),
      source: z.string().optional(),
      target: z.string(),
      read_only: BooleanSchema.optional(),
    })
    .passthrough(),
]);

const ServiceNetworksSchema = z.union([
  StringListSchema,
  z.record(
    z
      .object({
        aliases: StringListSchema.optional(),
        ipv4_address: z.string().optional(),
      })
      .passthrough()
      .nullable(),
  ),
]);

const HealthCheckSchema = z
  .object({
    test: z.union([z.string(), StringListSchema]).optional(),
    interval: DurationSchema.optional(),
    timeout: DurationSchema.optional(),
    retries: NumberSchema.optional(),
    start_period: DurationSchema.optional(),
    start_interval: DurationSchema.optional(),
    disable: BooleanSchema.optional(),
  })
  .passthrough();

export const DependencyConditionSchema = z.enum([
  'service_started',
  'service_healthy',
  'service_completed_successfully',
]);

const DependsOnSchema = z.union([
  StringListSchema,
  z.record(
    z
      .object({
        condition: DependencyConditionSchema.optional(),
        restart: BooleanSchema.optional(),
        required: BooleanSchema.optional(),
      })
      .passthrough()
      .nullable(),
  ),
]);

export const WatchActionSchema = z.enum(['rebuild', 'sync', 'sync+restart', 'restart']);

const DevelopSchema = z
  .object({
    watch: z
      .array(
        z
          .object({
            path: z.string(),
            action: WatchActionSchema,
            target: z.string().optional(),
            ignore: StringListSchema.optional(),
          })
          .passthrough(),
      )
      .optional(),
  })
  .passthrough();

export const ServiceSchema = z
  .object({
    image: z.string().optional(),
    build: BuildSchema.optional(),
    container_name: z.string().optional(),
    restart: z.string().optional(),
    env_file: EnvFileSchema.optional(),
    environment: EnvironmentSchema.optional(),
    ports: z.array(PortEntrySchema).optional(),
    networks: ServiceNetworksSchema.optional(),
    healthcheck: HealthCheckSchema.optional(),
    volumes: z.array(VolumeEntrySchema).optional(),
    depends_on: DependsOnSchema.optional(),
    develop: DevelopSchema.optional(),
  })
  .passthrough();

const ResourceSchema = z
  .object({
    driver: z.string().optional(),
    external: z.union([BooleanSchema, z.object({ name: z.string().optional() }).passthrough()]).optional(),
    name: z.string().optional(),
  })
  .passthrough()
  .nullable();

export const ComposeDocumentSchema = z
  .object({
    name: z.string().optional(),
    version: z.union([z.string(), z.number()]).optional(),
    services: z.record(ServiceSchema),
    volumes: z.record(ResourceSchema).optional(),
    networks: z.record(ResourceSchema).optional(),
  })
  .passthrough();

export type ComposeDocument = z.infer<typeof ComposeDocumentSchema>;
export type ComposeServiceDocument = z.infer<typeof ServiceSchema>;
export type ComposeResourceDocument = z.infer<typeof ResourceSchema>;

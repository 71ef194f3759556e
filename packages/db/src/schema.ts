import { boolean, index, integer, jsonb, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";
import type { ContractInterface, FunctionParam, ParamRule, ParamValue, ValidationRules } from "@cadence/types";

export const agents = pgTable("agents", {
  id: uuid("id").primaryKey(),
  name: text("name").notNull(),
  description: text("description").default("").notNull(),
  owner: text("owner").notNull(),
  contractAddress: text("contract_address").notNull(),
  contractInterface: jsonb("contract_interface").$type<ContractInterface>().notNull(),
  gasLimit: text("gas_limit"),
  maxPriorityFeeGwei: text("max_priority_fee_gwei"),
  scope: text("scope").default("persistent").notNull(),
  status: text("status").notNull(),
  lastExecutionAt: timestamp("last_execution_at", { withTimezone: true }),
  lastError: text("last_error"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull()
});

export const agentFunctions = pgTable(
  "agent_functions",
  {
    id: uuid("id").primaryKey(),
    agentId: uuid("agent_id")
      .notNull()
      .references(() => agents.id, { onDelete: "cascade" }),
    position: integer("position").notNull(),
    name: text("name").notNull(),
    signature: text("signature").notNull(),
    direction: text("direction").notNull(),
    enabled: boolean("enabled").default(true).notNull(),
    params: jsonb("params").$type<FunctionParam[]>().default([]).notNull(),
    validationRules: jsonb("validation_rules").$type<ValidationRules>().default({}).notNull(),
    returnRules: jsonb("return_rules").$type<ParamRule>(),
    abi: jsonb("abi").$type<Record<string, unknown>>().notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull()
  },
  (table) => ({
    agentIdx: index("idx_agent_functions_agent_id").on(table.agentId)
  })
);

export const agentSchedules = pgTable("agent_schedules", {
  agentId: uuid("agent_id")
    .primaryKey()
    .references(() => agents.id, { onDelete: "cascade" }),
  kind: text("kind").notNull(),
  intervalSeconds: integer("interval_seconds"),
  cronExpression: text("cron_expression"),
  isActive: boolean("is_active").default(true).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull()
});

export const executionRecords = pgTable(
  "execution_records",
  {
    id: uuid("id").primaryKey(),
    agentId: uuid("agent_id").notNull(),
    functionName: text("function_name"),
    params: jsonb("params").$type<Record<string, ParamValue>>().default({}).notNull(),
    outcome: text("outcome").notNull(),
    error: text("error"),
    errorKind: text("error_kind"),
    callId: text("call_id"),
    value: jsonb("value"),
    source: text("source").notNull(),
    startedAt: timestamp("started_at", { withTimezone: true }).notNull(),
    finishedAt: timestamp("finished_at", { withTimezone: true }).notNull()
  },
  (table) => ({
    agentIdx: index("idx_execution_records_agent_id").on(table.agentId),
    startedIdx: index("idx_execution_records_started").on(table.startedAt)
  })
);

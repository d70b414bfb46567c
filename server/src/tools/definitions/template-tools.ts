/**
 * Recurring Template Tools
 *
 * Templates describe repeating work; generate_recurring_tasks turns them
 * into dated tasks. Editing or deleting a template never touches tasks
 * that were already generated.
 */

import { nanoid } from "nanoid";
import { ConflictError, DomainError } from "../../errors.js";
import {
  FREQUENCIES,
  TEMPLATE_SCHEMA,
  isWeekday,
  type RecurrenceRule,
  type RecurringTaskTemplate,
} from "../../models/index.js";
import { materializeRecurringTasks, type MaterializeResult } from "../../recurrence/materialize.js";
import { defineSchema, deriveSchema, partial, type ToolArgs } from "../../schema/index.js";
import { createComponentLogger } from "../../logging.js";
import { Tool } from "../tool.js";
import { requireEntity, type ToolContext } from "./context.js";

const log = createComponentLogger("tools.templates");

// ============================================
// PARAMETER SCHEMAS
// ============================================

const CREATE_TEMPLATE = deriveSchema(
  TEMPLATE_SCHEMA,
  [
    "id",
    "name",
    "goals",
    "estimatedCompletionTime",
    "recurrenceRule",
    "startDate",
    "endDate",
    "canCompleteLate",
    "logInstructions",
  ],
  {
    name: "create_template",
    overrides: { id: { optional: true, description: "Template id; one is generated when omitted" } },
  },
);

const EDITABLE = ["name", "goals", "estimatedCompletionTime", "recurrenceRule", "endDate", "canCompleteLate", "logInstructions"];

const UPDATE_TEMPLATE = deriveSchema(TEMPLATE_SCHEMA, ["id", ...EDITABLE], {
  name: "update_template",
  overrides: {
    id: { description: "Id of the template to update" },
    ...partial(EDITABLE),
    recurrenceRule: { description: "Replacement rule; applies to future generation only", optional: true },
  },
});

const LIST_TEMPLATES = defineSchema("list_templates", {
  goal: { type: "string", description: "Only templates advancing this goal", optional: true },
});

const GENERATE = defineSchema("generate_recurring_tasks", {
  templateId: { type: "string", description: "Only this template; all templates when omitted", optional: true },
  asOf: { type: "date", description: "Generate occurrences up to and including this date (default: today)", optional: true },
});

// ============================================
// HELPERS
// ============================================

function readRule(rule: ToolArgs | undefined): RecurrenceRule {
  if (!rule) throw new Error("recurrenceRule was not provided");
  const weekdays = (rule.stringList("weekdays") ?? []).filter(isWeekday);
  return {
    frequency: rule.oneOf("frequency", FREQUENCIES),
    interval: rule.integer("interval"),
    weekdays: [...new Set(weekdays)],
  };
}

function assertDateRange(template: RecurringTaskTemplate): void {
  if (template.endDate !== undefined && template.endDate < template.startDate) {
    throw new DomainError(
      `Template "${template.id}" ends (${template.endDate}) before it starts (${template.startDate})`,
    );
  }
}

// ============================================
// TOOLS
// ============================================

export function templateTools({ store, clock }: ToolContext): Tool[] {
  return [
    new Tool("create_template", (args): RecurringTaskTemplate => {
      const id = args.optionalString("id") ?? `tmpl_${nanoid(10)}`;
      if (store.load("template", id)) throw new ConflictError("Template", id);

      const template: RecurringTaskTemplate = {
        id,
        name: args.string("name"),
        goals: args.stringList("goals") ?? [],
        estimatedCompletionTime: args.optionalInteger("estimatedCompletionTime"),
        recurrenceRule: readRule(args.nested("recurrenceRule")),
        startDate: args.string("startDate"),
        endDate: args.optionalString("endDate"),
        canCompleteLate: args.boolean("canCompleteLate"),
        logInstructions: args.optionalString("logInstructions"),
      };
      assertDateRange(template);

      store.save("template", template);
      log.info("Template created", { id, frequency: template.recurrenceRule.frequency });
      return template;
    }, CREATE_TEMPLATE,
      "Create a recurring task template, e.g. a run every Monday and Wednesday. " +
        "Call generate_recurring_tasks afterwards to create the dated tasks.",
      { category: "templates" }),

    new Tool("update_template", (args): RecurringTaskTemplate => {
      const template = requireEntity(store, "template", args.string("id"));

      const name = args.optionalString("name");
      if (name !== undefined) template.name = name;

      if (args.isCleared("goals")) template.goals = [];
      const goals = args.stringList("goals");
      if (goals) template.goals = goals;

      if (args.isCleared("estimatedCompletionTime")) delete template.estimatedCompletionTime;
      const estimate = args.optionalInteger("estimatedCompletionTime");
      if (estimate !== undefined) template.estimatedCompletionTime = estimate;

      if (args.isCleared("recurrenceRule")) throw new DomainError("A template's recurrenceRule cannot be cleared");
      if (args.has("recurrenceRule")) template.recurrenceRule = readRule(args.nested("recurrenceRule"));

      if (args.isCleared("endDate")) delete template.endDate;
      const endDate = args.optionalString("endDate");
      if (endDate !== undefined) template.endDate = endDate;

      const late = args.optionalBoolean("canCompleteLate");
      if (late !== undefined) template.canCompleteLate = late;

      if (args.isCleared("logInstructions")) delete template.logInstructions;
      const logInstructions = args.optionalString("logInstructions");
      if (logInstructions !== undefined) template.logInstructions = logInstructions;

      assertDateRange(template);
      store.save("template", template);
      return template;
    }, UPDATE_TEMPLATE,
      "Change a template. Only tasks generated from now on are affected. Pass null to clear an optional field.",
      { category: "templates" }),

    new Tool("get_template", (args): RecurringTaskTemplate => {
      return requireEntity(store, "template", args.string("id"));
    }, deriveSchema(TEMPLATE_SCHEMA, ["id"], { name: "get_template" }),
      "Get one recurring template.",
      { category: "templates", readOnly: true }),

    new Tool("list_templates", (args): RecurringTaskTemplate[] => {
      const goal = args.optionalString("goal");
      return store.list("template", goal === undefined ? {} : { goals: [goal] });
    }, LIST_TEMPLATES,
      "List recurring templates, optionally only those advancing one goal.",
      { category: "templates", readOnly: true }),

    new Tool("delete_template", (args): { deleted: string } => {
      const template = requireEntity(store, "template", args.string("id"));
      store.delete("template", template.id);
      log.info("Template deleted", { id: template.id });
      return { deleted: template.id };
    }, deriveSchema(TEMPLATE_SCHEMA, ["id"], { name: "delete_template" }),
      "Delete a recurring template. Tasks already generated from it are kept.",
      { category: "templates" }),

    new Tool("generate_recurring_tasks", (args): MaterializeResult => {
      const asOf = args.optionalString("asOf") ?? clock.today();
      return materializeRecurringTasks(store, asOf, args.optionalString("templateId"));
    }, GENERATE,
      "Create the dated tasks that recurring templates have produced up to a date (default: today). " +
        "Safe to repeat: occurrences that already exist are not created twice.",
      { category: "templates" }),
  ];
}

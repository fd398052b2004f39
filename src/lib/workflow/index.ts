import type {
  ActionPriority,
  AuditLogEntry,
  Finding,
  FollowUpAction,
  RiskLevel,
  VendorProfile,
} from "@/lib/schemas/assessment";
import {
  CONSOLIDATED_DUE_DAYS,
  CONSOLIDATED_PRIORITY,
  CONSOLIDATION_MIN_MISSING,
  FOLLOW_UP_RULES,
  type FollowUpRule,
} from "./rules";
import { bulletList, renderTemplate, titleCase, type TemplateKey } from "./templates";

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_CONTACT_NAME = "Vendor Contact";

const PRIORITY_RANK: Record<ActionPriority, number> = { low: 0, medium: 1, high: 2, urgent: 3 };

export interface AssessmentSnapshot {
  overallScore: number;
  riskCategory: RiskLevel;
}

export interface WorkflowContext {
  vendor: VendorProfile;
  /** Used when the vendor has no contact email */
  defaultRecipient: string;
  now: Date;
}

export function createAuditEntry(
  eventType: string,
  entityType: string,
  entityId: string,
  description: string,
  metadata: Record<string, unknown> = {},
  now: Date = new Date()
): AuditLogEntry {
  return {
    eventType,
    entityType,
    entityId,
    actor: "system",
    description,
    metadata,
    timestamp: now.toISOString(),
  };
}

function dueDate(now: Date, days: number): string {
  return new Date(now.getTime() + days * DAY_MS).toISOString();
}

function findingLine(finding: Finding, template: TemplateKey): string {
  if (template === "clarification_request" && finding.evidence) {
    const evidence = finding.evidence.length > 100 ? `${finding.evidence.slice(0, 100)}...` : finding.evidence;
    return `${finding.description}: ${evidence}`;
  }
  return finding.description;
}

function buildAction(
  context: WorkflowContext,
  fields: {
    id: string;
    ruleId: string;
    actionType: string;
    priority: ActionPriority;
    dueDays: number;
    template: TemplateKey;
    subject: string;
    lines: string[];
    category?: string;
  }
): FollowUpAction {
  const due = dueDate(context.now, fields.dueDays);
  return {
    id: fields.id,
    ruleId: fields.ruleId,
    actionType: fields.actionType,
    priority: fields.priority,
    subject: fields.subject,
    message: renderTemplate(fields.template, {
      vendorName: context.vendor.name,
      contactName: context.vendor.contactName ?? DEFAULT_CONTACT_NAME,
      // The same gap found in several documents is asked for once
      items: bulletList([...new Set(fields.lines)]),
      dueDate: due.slice(0, 10),
    }),
    recipient: context.vendor.contactEmail ?? context.defaultRecipient,
    dueDate: due,
    attemptCount: 0,
    escalated: false,
    status: "pending",
    category: fields.category,
  };
}

function ruleAction(
  rule: FollowUpRule,
  findings: readonly Finding[],
  assessment: AssessmentSnapshot,
  context: WorkflowContext
): FollowUpAction {
  const lines = rule.relevant(findings).map((f) => findingLine(f, rule.template));
  if (rule.actionType === "risk_review") {
    lines.unshift(`Overall risk score ${assessment.overallScore} (${assessment.riskCategory})`);
  }
  return buildAction(context, {
    id: `${context.vendor.domain}:${rule.id}`,
    ruleId: rule.id,
    actionType: rule.actionType,
    priority: rule.priority,
    dueDays: rule.dueDays,
    template: rule.template,
    subject: `Security assessment follow-up: ${titleCase(rule.id)} - ${context.vendor.name}`,
    lines,
    category: rule.category,
  });
}

function consolidatedActions(findings: readonly Finding[], context: WorkflowContext): FollowUpAction[] {
  const missingByCategory = new Map<string, Set<string>>();
  for (const f of findings) {
    if (f.findingType !== "missing") continue;
    const set = missingByCategory.get(f.category) ?? new Set<string>();
    set.add(f.description);
    missingByCategory.set(f.category, set);
  }

  const actions: FollowUpAction[] = [];
  for (const [category, descriptions] of missingByCategory) {
    if (descriptions.size < CONSOLIDATION_MIN_MISSING) continue;
    actions.push(
      buildAction(context, {
        id: `${context.vendor.domain}:missing_documents:${category}`,
        ruleId: `missing_documents:${category}`,
        actionType: "document_request",
        priority: CONSOLIDATED_PRIORITY,
        dueDays: CONSOLIDATED_DUE_DAYS,
        template: "document_request",
        subject: `Missing ${titleCase(category)} documentation - ${context.vendor.name}`,
        lines: [...descriptions],
        category,
      })
    );
  }
  return actions;
}

/**
 * Applies the follow-up rule table and per-category consolidation.
 * A category never receives two document requests: a rule-generated request
 * is folded into the consolidated one, which keeps the higher priority and
 * the earlier due date.
 */
export function generateActions(
  findings: readonly Finding[],
  assessment: AssessmentSnapshot,
  context: WorkflowContext
): FollowUpAction[] {
  const fromRules = FOLLOW_UP_RULES.filter((rule) => rule.trigger(findings)).map((rule) =>
    ruleAction(rule, findings, assessment, context)
  );
  const consolidated = consolidatedActions(findings, context);

  const kept: FollowUpAction[] = [];
  for (const action of fromRules) {
    const index =
      action.actionType === "document_request"
        ? consolidated.findIndex((c) => c.category === action.category)
        : -1;
    const target = consolidated[index];
    if (index === -1 || !target) {
      kept.push(action);
      continue;
    }
    consolidated[index] = {
      ...target,
      priority: PRIORITY_RANK[action.priority] > PRIORITY_RANK[target.priority] ? action.priority : target.priority,
      dueDate: action.dueDate < target.dueDate ? action.dueDate : target.dueDate,
    };
  }

  const actions = [...kept, ...consolidated];
  console.log(`[workflow] ${actions.length} follow-up action(s) for ${context.vendor.domain}`);
  return actions;
}

export type SendFn = (action: FollowUpAction) => Promise<boolean>;

/**
 * Default transport: logs the would-be email and reports success.
 */
export const simulateSend: SendFn = async (action) => {
  console.log(`[workflow] Email simulation: would send "${action.subject}" to ${action.recipient}`);
  return true;
};

export interface ProcessQueueOptions {
  now: Date;
  maxAttempts?: number;
  send?: SendFn;
  vendorName?: string;
  contactName?: string;
}

export interface QueueStats {
  processed: number;
  sent: number;
  failed: number;
  overdue: number;
  escalated: number;
  skipped: number;
}

export interface Escalation {
  actionId: string;
  message: string;
}

export interface ProcessQueueResult {
  actions: FollowUpAction[];
  stats: QueueStats;
  escalations: Escalation[];
}

/**
 * One pass over pending follow-ups. Overdue actions count an attempt; once
 * attempts reach `maxAttempts` the action is escalated and never sent again.
 * Sent actions that are not yet overdue are left alone. Input actions are
 * not mutated.
 */
export async function processQueue(
  actions: readonly FollowUpAction[],
  options: ProcessQueueOptions
): Promise<ProcessQueueResult> {
  const maxAttempts = options.maxAttempts ?? 3;
  const send = options.send ?? simulateSend;
  const stats: QueueStats = { processed: 0, sent: 0, failed: 0, overdue: 0, escalated: 0, skipped: 0 };
  const escalations: Escalation[] = [];
  const updated: FollowUpAction[] = [];

  for (const original of actions) {
    if (original.escalated || original.status === "escalated") {
      stats.skipped++;
      updated.push(original);
      continue;
    }

    stats.processed++;
    let action: FollowUpAction = { ...original };
    const overdue = options.now.getTime() > Date.parse(action.dueDate);

    if (overdue) {
      stats.overdue++;
      action = { ...action, attemptCount: action.attemptCount + 1 };
      if (action.attemptCount >= maxAttempts) {
        stats.escalated++;
        action = { ...action, escalated: true, status: "escalated" };
        escalations.push({
          actionId: action.id,
          message: renderTemplate("escalation", {
            vendorName: options.vendorName ?? "Vendor",
            contactName: options.contactName ?? DEFAULT_CONTACT_NAME,
            items: bulletList([action.subject]),
            dueDate: action.dueDate.slice(0, 10),
          }),
        });
        console.warn(
          `[workflow] ESCALATION: action ${action.id} unanswered after ${action.attemptCount} attempt(s)`
        );
        updated.push(action);
        continue;
      }
    } else if (action.status === "sent") {
      updated.push(action);
      continue;
    }

    const outgoing: FollowUpAction = overdue
      ? {
          ...action,
          subject: `Reminder: ${action.subject}`,
          message: renderTemplate("follow_up_reminder", {
            vendorName: options.vendorName ?? "Vendor",
            contactName: options.contactName ?? DEFAULT_CONTACT_NAME,
            items: bulletList([action.subject]),
            dueDate: action.dueDate.slice(0, 10),
          }),
        }
      : action;
    let ok: boolean;
    try {
      ok = await send(outgoing);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[workflow] Sending action ${action.id} failed: ${message}`);
      ok = false;
    }

    if (ok) {
      stats.sent++;
      action = { ...action, status: "sent" };
    } else {
      stats.failed++;
      action = { ...action, status: "failed" };
    }
    updated.push(action);
  }

  return { actions: updated, stats, escalations };
}

export { FOLLOW_UP_RULES } from "./rules";

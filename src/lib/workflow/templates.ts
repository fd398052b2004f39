export type TemplateKey =
  | "document_request"
  | "clarification_request"
  | "compliance_gaps"
  | "follow_up_reminder"
  | "escalation";

export interface TemplateVars {
  vendorName: string;
  contactName: string;
  /** Pre-rendered bullet list */
  items: string;
  dueDate: string;
}

const SIGNATURE = "Best regards,\nVendor Risk Assessment Team";

const TEMPLATES: Record<TemplateKey, (v: TemplateVars) => string> = {
  document_request: (v) => `Dear ${v.contactName},

We are conducting a vendor risk assessment of ${v.vendorName} as part of our standard security review.

We could not locate the following and would appreciate copies or links:

${v.items}

Please respond by ${v.dueDate}. If an item does not apply to your service, let us know.

${SIGNATURE}`,

  clarification_request: (v) => `Dear ${v.contactName},

While reviewing ${v.vendorName}'s security documentation we found areas that need clarification:

${v.items}

Please send additional detail on these points by ${v.dueDate}.

${SIGNATURE}`,

  compliance_gaps: (v) => `Dear ${v.contactName},

Our assessment of ${v.vendorName} identified potential compliance gaps we would like to discuss:

${v.items}

Please share your remediation plans and your availability for a short call before ${v.dueDate}.

${SIGNATURE}`,

  follow_up_reminder: (v) => `Dear ${v.contactName},

This is a reminder about our security assessment of ${v.vendorName}. We are still waiting on:

${v.items}

Please provide the requested information by ${v.dueDate}.

${SIGNATURE}`,

  escalation: (v) => `Dear ${v.contactName},

Despite repeated requests we have not received the security information needed to complete our assessment of ${v.vendorName}:

${v.items}

This is blocking the assessment. Please respond as soon as possible.

${SIGNATURE}`,
};

export function renderTemplate(key: TemplateKey, vars: TemplateVars): string {
  return TEMPLATES[key](vars);
}

export function bulletList(lines: string[]): string {
  return lines.length > 0 ? lines.map((line) => `- ${line}`).join("\n") : "- (see assessment report)";
}

/** "privacy_compliance" -> "Privacy Compliance" */
export function titleCase(snake: string): string {
  return snake
    .split("_")
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

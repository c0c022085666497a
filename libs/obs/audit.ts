import { LambdaClient, InvokeCommand } from "@aws-sdk/client-lambda";
import { errorMessage } from "./errors";

const lambda = new LambdaClient({});
const AUDIT_FN_ARN = process.env.AUDIT_FN_ARN;

export interface AuditEvent {
  type: string;
  tenantId: string;
  traceId?: string;
  [detail: string]: unknown;
}

export async function auditFireAndForget(payload: AuditEvent) {
  if (!AUDIT_FN_ARN) return;
  try {
    await lambda.send(
      new InvokeCommand({
        FunctionName: AUDIT_FN_ARN,
        InvocationType: "Event",
        Payload: Buffer.from(JSON.stringify(payload)),
      })
    );
  } catch (e) {
    console.warn("audit-invoke-failed", errorMessage(e));
  }
}

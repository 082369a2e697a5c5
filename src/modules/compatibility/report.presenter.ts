import { CompatReport } from '../../database/entities/compat-report.entity';
import { Invite } from '../../database/entities/invite.entity';
import { User } from '../../database/entities/user.entity';
import { presentCounterpart } from '../users/user.presenter';

export function otherUserId(report: CompatReport, currentUserId: number): number {
  return report.userLowId === currentUserId ? report.userHighId : report.userLowId;
}

export function serializeReport(report: CompatReport, currentUserId: number, counterpart?: User | null) {
  const otherId = otherUserId(report, currentUserId);
  return {
    id: report.id,
    reportId: report.id,
    other_user_id: otherId,
    lang: report.language || 'ru',
    prompt_version: report.promptVersion,
    status: report.status,
    text: report.text ?? '',
    created_at: report.createdAt,
    createdAt: report.createdAt,
    counterpart: presentCounterpart(counterpart ?? undefined, otherId),
  };
}

export type SerializedReport = ReturnType<typeof serializeReport>;

export function serializeInvite(invite: Invite) {
  return {
    token: invite.token,
    status: invite.status,
    prompt_version: invite.promptVersion,
    created_at: invite.createdAt,
  };
}

import { User } from './user.entity';
import { UserResult } from './user-result.entity';
import { Run } from './run.entity';
import { RunAnswer } from './run-answer.entity';
import { ShortResult } from './short-result.entity';
import { FullResult } from './full-result.entity';
import { CompatReport } from './compat-report.entity';
import { Invite } from './invite.entity';
import { PackPurchase } from './pack-purchase.entity';

export const ENTITIES = [
  User, UserResult, Run, RunAnswer,
  ShortResult, FullResult, CompatReport, Invite, PackPurchase,
];

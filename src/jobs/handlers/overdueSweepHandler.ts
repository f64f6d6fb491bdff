// src/jobs/handlers/overdueSweepHandler.ts
import { IJob } from '../../models/job.model';
import { IOverdueSweepResult, LedgerService } from '../../services/ledger.service';

/** Worker logic for the 'ledger.overdue_sweep' job type. */
export function createOverdueSweepHandler(ledger: LedgerService) {
    return async function handleOverdueSweepJob(job: IJob): Promise<IOverdueSweepResult> {
        const { asOf } = job.payload;
        let sweepAt = new Date();

        if (typeof asOf === 'string') {
            sweepAt = new Date(asOf);
            if (Number.isNaN(sweepAt.getTime())) {
                throw new Error(`JobDataInvalid: asOf is not a date (${asOf}).`);
            }
        }

        return ledger.sweepOverdue(sweepAt);
    };
}

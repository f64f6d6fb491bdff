import { JOB_TYPES, getJobPolicy, isJobType, validateJobPayload } from '../../src/jobs/jobRegistry';

describe('Job Registry Unit Tests', () => {
  describe('validateJobPayload', () => {
    it('should accept a valid notification dispatch payload', () => {
      expect(() => validateJobPayload(JOB_TYPES.NOTIFICATION_DISPATCH, { notificationId: 'notif_1' })).not.toThrow();
    });

    it('should throw SchemaValidationFailed for a missing required field', () => {
      expect(() => validateJobPayload(JOB_TYPES.NOTIFICATION_DISPATCH, {})).toThrow(
        'SchemaValidationFailed: Missing required field: notificationId'
      );
    });

    it('should throw SchemaValidationFailed for a field of the wrong type', () => {
      expect(() => validateJobPayload(JOB_TYPES.LEDGER_OVERDUE_SWEEP, { asOf: 123 })).toThrow(
        'Invalid type for field asOf: expected string, got number'
      );
    });

    it('should accept an empty overdue sweep payload', () => {
      expect(() => validateJobPayload(JOB_TYPES.LEDGER_OVERDUE_SWEEP, {})).not.toThrow();
    });

    it('should throw JobTypeNotFound for an unknown job type', () => {
      expect(() => validateJobPayload('thumbnail.create', { assetId: 'a' })).toThrow('JobTypeNotFound');
      expect(isJobType('thumbnail.create')).toBe(false);
    });
  });

  describe('getJobPolicy', () => {
    it('should return the policy of each registered type', () => {
      expect(getJobPolicy(JOB_TYPES.NOTIFICATION_DISPATCH)).toEqual({
        type: 'notification.dispatch',
        maxAttempts: 5,
        timeoutSeconds: 60,
      });
      expect(getJobPolicy(JOB_TYPES.LEDGER_OVERDUE_SWEEP).maxAttempts).toBe(3);
    });
  });
});

export const JobStatuses = [
    'queued',
    'processing',
    'paused',
    'completed',
    'error'
] as const;

export type JobStatus = typeof JobStatuses[number]

export const TerminalJobStatuses: readonly JobStatus[] = ['completed', 'error'];

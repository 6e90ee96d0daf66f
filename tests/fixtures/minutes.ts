/**
 * Minutes Insights - Test Fixtures
 */

import type { MinutesRecord } from '../../src/minutes/schema.js';

export const SAMPLE_MINUTES: MinutesRecord[] = [
  {
    id: 1,
    week_number: 1,
    meeting_date: '2026-01-05',
    details: 'Kick-off',
    attendees: 'Ana Lima, Ben Ortiz',
    meeting_topic: 'Planning',
    meeting_purpose: 'Goals',
    summary: 'Goals drafted',
    target_date: '2026-01-16',
    future_plan: 'Share goals',
    decisions: 'Adopt goals',
    responsible: 'Ana Lima',
    notes: null,
  },
  {
    id: 2,
    week_number: 2,
    meeting_date: '2026-01-12',
    details: 'Budget walkthrough',
    attendees: 'Ana Lima, Dan Reyes',
    meeting_topic: 'Budget',
    meeting_purpose: 'Review spend',
    summary: "Travel is over plan, it's flagged",
    target_date: '2026-01-30',
    future_plan: 'Revise travel policy',
    decisions: 'Freeze travel',
    responsible: 'Dan Reyes',
    notes: 'Monthly reports',
  },
  {
    id: 3,
    week_number: 3,
    meeting_date: '2026-01-19',
    details: 'Hiring sync',
    attendees: 'Ben Ortiz, Eve Park',
    meeting_topic: 'Hiring',
    meeting_purpose: 'Interview loop',
    summary: 'Loop agreed',
    target_date: null,
    future_plan: null,
    decisions: null,
    responsible: null,
    notes: null,
  },
  {
    id: 4,
    week_number: 5,
    meeting_date: '2026-02-02',
    details: 'Budget follow-up',
    attendees: 'ana lima, Dan Reyes, Eve Park',
    meeting_topic: 'Budget',
    meeting_purpose: 'Check freeze',
    summary: 'Back within plan',
    target_date: '2026-02-27',
    future_plan: 'Lift freeze',
    decisions: 'Keep freeze',
    responsible: 'Dan Reyes; Ana Lima',
    notes: null,
  },
  {
    id: 5,
    week_number: 6,
    meeting_date: '2026-02-09',
    details: 'Release review',
    attendees: 'Ben Ortiz',
    meeting_topic: 'Release',
    meeting_purpose: 'Release date',
    summary: 'Blockers open',
    target_date: '2026-02-20',
    future_plan: 'Fix blockers',
    decisions: 'Delay release',
    responsible: 'Ben Ortiz and Eve Park',
    notes: null,
  },
];

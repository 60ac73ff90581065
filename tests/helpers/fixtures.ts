/**
 * Shared test data
 */

export const MEETING_SEGMENTS = [
  { segmentId: 0, speaker: '1', startTime: 0.0, text: '오늘 회의를 시작합니다' },
  { segmentId: 1, speaker: '2', startTime: 5.2, text: '예산안을 검토하겠습니다' },
  { segmentId: 2, speaker: '1', startTime: 12.0, text: '다음 주까지 제출해주세요' },
];

export const MEETING_SUMMARY = [
  '## 예산',
  '예산안 검토를 진행했습니다.',
  '## 일정',
  '다음 주까지 제출하기로 했습니다.',
].join('\n');

export const LECTURE_SEGMENTS = [
  { segmentId: 0, speaker: 0, startTime: 0, endTime: 4.5, text: 'Welcome to the lecture on vectors' },
  { segmentId: 1, speaker: 0, startTime: 4.5, endTime: 9, text: 'Cosine distance compares directions' },
];

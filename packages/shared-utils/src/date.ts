import { DateTime } from 'luxon';

export function nowIso(): string {
  const iso = DateTime.utc().toISO();
  if (!iso) throw new Error('현재 시각 ISO 변환 실패');
  return iso;
}


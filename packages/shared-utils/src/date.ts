import { DateTime } from 'luxon';

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function nowIso(): string {
  const iso = DateTime.utc().toISO();
  if (!iso) throw new Error('현재 시각 ISO 변환 실패');
  return iso;
}

/**
 * 오늘 날짜 (YYYY-MM-DD, 지정 타임존 기준)
 */
export function todayIsoDate(zone = 'utc'): string {
  const date = DateTime.now().setZone(zone).toISODate();
  if (!date) throw new Error('오늘 날짜 변환 실패');
  return date;
}

/**
 * YYYY-MM-DD 형식 검증 + 실존 날짜 확인 (2024-02-30 같은 값 거부)
 */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_RE.test(value)) return false;
  return DateTime.fromISO(value, { zone: 'utc' }).isValid;
}

/**
 * YYYY-MM-DD → 해당 날짜 00:00 UTC의 epoch 초
 */
export function isoDateToEpochSeconds(value: string): number {
  const dt = DateTime.fromISO(value, { zone: 'utc' });
  if (!dt.isValid || !ISO_DATE_RE.test(value)) {
    throw new Error(`날짜 형식 오류 (YYYY-MM-DD): ${value}`);
  }
  return Math.floor(dt.toSeconds());
}

/**
 * epoch 초 → 지정 타임존 기준 거래일 (YYYY-MM-DD)
 */
export function epochSecondsToIsoDate(seconds: number, zone = 'utc'): string {
  const date = DateTime.fromSeconds(seconds, { zone }).toISODate();
  if (!date) throw new Error(`epoch 변환 실패: ${seconds} (${zone})`);
  return date;
}

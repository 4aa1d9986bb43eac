import { describe, expect, it } from 'vitest';
import { nextCalendarDay, parseAppointmentTime, parseCalendarDate } from './date.utils';

describe('parseCalendarDate', () => {
  it('accepts real YYYY-MM-DD dates', () => {
    expect(parseCalendarDate('1990-05-17')).toBe('1990-05-17');
    expect(parseCalendarDate('2024-02-29')).toBe('2024-02-29');
  });

  it('rejects impossible or malformed dates', () => {
    expect(parseCalendarDate('2023-02-29')).toBeNull();
    expect(parseCalendarDate('2023-13-01')).toBeNull();
    expect(parseCalendarDate('17/05/1990')).toBeNull();
    expect(parseCalendarDate('1990-5-17')).toBeNull();
  });
});

describe('parseAppointmentTime', () => {
  it('keeps minute precision and stores seconds as zero', () => {
    const slot = parseAppointmentTime('2031-03-10 14:30');
    expect(slot?.timestamp).toBe('2031-03-10 14:30:00');
    expect(slot?.date.getTime()).toBe(new Date(2031, 2, 10, 14, 30).getTime());
  });

  it('rejects other formats and out of range values', () => {
    expect(parseAppointmentTime('2031-03-10T14:30')).toBeNull();
    expect(parseAppointmentTime('2031-03-10 14:30:00')).toBeNull();
    expect(parseAppointmentTime('2031-03-10 24:00')).toBeNull();
    expect(parseAppointmentTime('2031-03-10 10:60')).toBeNull();
    expect(parseAppointmentTime('2031-02-30 10:00')).toBeNull();
  });
});

describe('nextCalendarDay', () => {
  it('rolls over months and years', () => {
    expect(nextCalendarDay('2031-03-10')).toBe('2031-03-11');
    expect(nextCalendarDay('2031-01-31')).toBe('2031-02-01');
    expect(nextCalendarDay('2031-12-31')).toBe('2032-01-01');
    expect(nextCalendarDay('2032-02-28')).toBe('2032-02-29');
  });
});

// Appointment scheduling
// Free slots within clinic hours, and booking of non-overlapping appointments

import { guardStorage, type ClinicDb } from '../db.js';
import { env } from '../env.js';
import { AppError } from '../utils/errors.js';

export interface ClinicHours {
  openHour: number;
  closeHour: number;
  slotMinutes: number;
  utcOffset: string; // e.g. "-03:00"
}

export interface BusyInterval {
  startsAt: Date;
  endsAt: Date;
}

export interface Appointment {
  id: number;
  patient_id: string;
  starts_at: string;
  ends_at: string;
  created_at: string;
}

export interface Availability {
  date: string;
  slots: string[];
}

const MINUTE_MS = 60 * 1000;
const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
const TIME_REGEX = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function clinicHoursFromEnv(): ClinicHours {
  return {
    openHour: env.CLINIC_OPEN_HOUR,
    closeHour: env.CLINIC_CLOSE_HOUR,
    slotMinutes: env.APPOINTMENT_DURATION_MINUTES,
    utcOffset: env.CLINIC_UTC_OFFSET,
  };
}

export function isValidDate(date: string): boolean {
  if (!DATE_REGEX.test(date)) return false;
  const parsed = new Date(`${date}T00:00:00Z`);
  return !isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === date;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function formatMinutes(minutes: number): string {
  return `${pad(Math.floor(minutes / 60))}:${pad(minutes % 60)}`;
}

function startOfLocalDay(date: string, utcOffset: string): Date {
  return new Date(`${date}T00:00:00${utcOffset}`);
}

/** Slot start times as minutes after local midnight. */
function slotMinutesOfDay(hours: ClinicHours): number[] {
  const starts: number[] = [];
  const close = hours.closeHour * 60;
  for (let minute = hours.openHour * 60; minute + hours.slotMinutes <= close; minute += hours.slotMinutes) {
    starts.push(minute);
  }
  return starts;
}

function overlaps(start: Date, end: Date, busy: BusyInterval): boolean {
  return !(end <= busy.startsAt || start >= busy.endsAt);
}

/**
 * Slot starts ("HH:MM", clinic local time) on `date` that overlap none of `busy`.
 */
export function computeFreeSlots(date: string, busy: BusyInterval[], hours: ClinicHours): string[] {
  const dayStart = startOfLocalDay(date, hours.utcOffset).getTime();

  return slotMinutesOfDay(hours)
    .filter(minute => {
      const start = new Date(dayStart + minute * MINUTE_MS);
      const end = new Date(start.getTime() + hours.slotMinutes * MINUTE_MS);
      return !busy.some(interval => overlaps(start, end, interval));
    })
    .map(formatMinutes);
}

export class SchedulingService {
  constructor(
    private readonly db: ClinicDb,
    private readonly hours: ClinicHours = clinicHoursFromEnv(),
  ) {}

  private busyIntervals(date: string): BusyInterval[] {
    const dayStart = startOfLocalDay(date, this.hours.utcOffset);
    const dayEnd = new Date(dayStart.getTime() + 24 * 60 * MINUTE_MS);

    const rows = this.db
      .prepare<[string, string], { starts_at: string; ends_at: string }>(
        'SELECT starts_at, ends_at FROM appointments WHERE starts_at < ? AND ends_at > ?',
      )
      .all(dayEnd.toISOString(), dayStart.toISOString());

    return rows.map(row => ({ startsAt: new Date(row.starts_at), endsAt: new Date(row.ends_at) }));
  }

  availability(date: string): Availability {
    if (!isValidDate(date)) {
      throw AppError.validationError('date must be a calendar date in YYYY-MM-DD format', { date });
    }
    return guardStorage('availability lookup', () => ({
      date,
      slots: computeFreeSlots(date, this.busyIntervals(date), this.hours),
    }));
  }

  book(patientId: string, date: string, time: string, now: Date = new Date()): Appointment {
    if (!isValidDate(date)) {
      throw AppError.validationError('date must be a calendar date in YYYY-MM-DD format', { date });
    }
    const match = TIME_REGEX.exec(time);
    if (!match) {
      throw AppError.validationError('time must be in HH:MM format', { time });
    }

    const minute = Number(match[1]) * 60 + Number(match[2]);
    if (!slotMinutesOfDay(this.hours).includes(minute)) {
      throw AppError.validationError('time is not an appointment slot within clinic hours', { time });
    }

    const startsAt = new Date(startOfLocalDay(date, this.hours.utcOffset).getTime() + minute * MINUTE_MS);
    const endsAt = new Date(startsAt.getTime() + this.hours.slotMinutes * MINUTE_MS);

    return guardStorage('appointment booking', () =>
      this.db.transaction(() => {
        const patient = this.db
          .prepare<[string], { id: string }>('SELECT id FROM patients WHERE id = ?')
          .get(patientId);
        if (!patient) {
          throw AppError.notFound('Patient not found', { patient_id: patientId });
        }

        const taken = this.busyIntervals(date).some(interval => overlaps(startsAt, endsAt, interval));
        if (taken) {
          throw AppError.conflict('Slot is already booked', { date, time });
        }

        const createdAt = now.toISOString();
        const result = this.db
          .prepare(
            `INSERT INTO appointments (patient_id, starts_at, ends_at, created_at)
             VALUES (?, ?, ?, ?)`,
          )
          .run(patientId, startsAt.toISOString(), endsAt.toISOString(), createdAt);

        return {
          id: Number(result.lastInsertRowid),
          patient_id: patientId,
          starts_at: startsAt.toISOString(),
          ends_at: endsAt.toISOString(),
          created_at: createdAt,
        };
      })(),
    );
  }

  listForPatient(patientId: string): Appointment[] {
    return guardStorage('appointment history', () =>
      this.db
        .prepare<[string], Appointment>(
          `SELECT id, patient_id, starts_at, ends_at, created_at
           FROM appointments
           WHERE patient_id = ?
           ORDER BY starts_at ASC`,
        )
        .all(patientId),
    );
  }
}

import { describe, it, expect } from 'vitest';
import { findMatchingSlot, formatTimeSlot } from '../src/matcher';
import { parseSlots } from '../src/slots';
import { Slot } from '../src/types';
import { OVERVIEW_URL, readFixture } from './helpers';

const wednesdayTwoPm: Slot = {
  day: 'Mittwoch',
  time: '14:00-15:00',
  startHour: 14,
  court: '1',
  open: true,
  bookingUrl: 'https://booking.example.com/buchung.html?slot=w1',
};

describe('formatTimeSlot', () => {
  it('pads hours to two digits', () => {
    expect(formatTimeSlot(8)).toBe('08:00-09:00');
    expect(formatTimeSlot(9)).toBe('09:00-10:00');
    expect(formatTimeSlot(22)).toBe('22:00-23:00');
  });
});

describe('findMatchingSlot', () => {
  it('returns the slot with the wanted day and hour', () => {
    expect(findMatchingSlot([wednesdayTwoPm], { day: 'Mittwoch', startHour: 14 })).toBe(wednesdayTwoPm);
  });

  it('returns nothing for another hour', () => {
    expect(findMatchingSlot([wednesdayTwoPm], { day: 'Mittwoch', startHour: 15 })).toBeUndefined();
  });

  it('returns nothing for another day', () => {
    expect(findMatchingSlot([wednesdayTwoPm], { day: 'Donnerstag', startHour: 14 })).toBeUndefined();
  });

  it('ignores full slots', () => {
    const full: Slot = { ...wednesdayTwoPm, open: false };

    expect(findMatchingSlot([full], { day: 'Mittwoch', startHour: 14 })).toBeUndefined();
  });

  it('picks the first court in page order', () => {
    const slots = parseSlots(readFixture('overview.html'), OVERVIEW_URL);

    const match = findMatchingSlot(slots, { day: 'Mittwoch', startHour: 14 });
    expect(match?.court).toBe('2');
    expect(match?.bookingUrl).toBe(
      'https://booking.example.com/angebote/aktueller_zeitraum/buchung.html?slot=w2'
    );
  });

  it('does not match a closed slot on a page', () => {
    const slots = parseSlots(readFixture('overview.html'), OVERVIEW_URL);

    expect(findMatchingSlot(slots, { day: 'Mittwoch', startHour: 13 })).toBeUndefined();
    expect(findMatchingSlot(slots, { day: 'Montag', startHour: 9 })).toBeUndefined();
  });

  it('matches only the exact one-hour label of the wanted hour', () => {
    const html = `
      <div class="table-body-group">
        <div class="table-row"><div class="table-head column-1">Mittwoch</div></div>
        <div class="table-row">
          <div class="date bookable"><a href="half.html"><strong class="time">14:30-15:30</strong><span class="detail">Feld 1</span></a></div>
          <div class="date bookable"><a href="long.html"><strong class="time">14:00-16:00</strong><span class="detail">Feld 2</span></a></div>
        </div>
      </div>`;
    const offHour = parseSlots(html, OVERVIEW_URL);

    expect(offHour.map((slot) => slot.startHour)).toEqual([14, 14]);
    expect(findMatchingSlot(offHour, { day: 'Mittwoch', startHour: 14 })).toBeUndefined();

    const exact: Slot = { ...wednesdayTwoPm, court: '3' };
    expect(findMatchingSlot([...offHour, exact], { day: 'Mittwoch', startHour: 14 })).toBe(exact);
  });

  it('returns only open slots with equal day and hour', () => {
    const slots = parseSlots(readFixture('overview.html'), OVERVIEW_URL);

    for (const day of ['Montag', 'Dienstag', 'Mittwoch', 'Donnerstag']) {
      for (let hour = 8; hour <= 22; hour += 1) {
        const match = findMatchingSlot(slots, { day, startHour: hour });
        if (match) {
          expect(match).toMatchObject({ day, startHour: hour, time: formatTimeSlot(hour), open: true });
        }
      }
    }
  });
});

import 'dayjs/locale/id';
import { PRAYER_EMOJI, PRAYER_NAMES } from '../types/domain';
import type { DayStatus, PrayerName, PrayerTimes, ReadingState } from '../types/domain';
import type { InlineKeyboardButton, InlineKeyboardMarkup, ReplyKeyboardMarkup } from '../types/telegram';
import type { ChecklistSummary } from '../prayer/checklist';
import type { ValueError } from '../reading/selectionFlow';
import { SURAHS, findSurah, type Surah, type SurahPage } from '../reading/surahs';
import type { ScheduledEvent } from '../scheduler/ReminderScheduler';
import { getNowInTimezone } from '../utils/time';
import { CALLBACK } from './callbackData';

export const UNAVAILABLE = 'tidak tersedia';
export const TRY_AGAIN_LATER = '⚠️ Gagal menyimpan atau membaca data. Coba lagi nanti.';
export const LOCATION_BUTTON = '📍 Kirim lokasi';

const VALUE_ERROR_TEXT: Record<ValueError, string> = {
  NOT_A_NUMBER: 'Nomor ayat harus berupa angka.',
  NOT_POSITIVE: 'Nomor ayat minimal 1.',
  BEYOND_SURAH: 'Nomor ayat melebihi jumlah ayat surah ini.'
};

function statusMark(done: boolean): string {
  return done ? '✅' : '⬜';
}

function listOrDash(names: string[]): string {
  return names.length ? names.join(', ') : '-';
}

export class ContentComposer {
  constructor(
    private readonly timezone: string,
    private readonly catalog: readonly Surah[] = SURAHS
  ) {}

  startText(): string {
    return [
      "Assalamu'alaikum! 🕌",
      '',
      'Aku bot tracker solat dan ngaji kamu.',
      '',
      'Perintah yang tersedia:',
      '/solat — lihat tracker & tandai solat',
      '/jadwal — lihat jadwal solat hari ini',
      '/rekap — rekap solat hari ini',
      '/ingatkan — aktifkan pengingat solat hari ini',
      '/lokasi — atur lokasi untuk jadwal solat',
      '/ngaji — lihat progres bacaan Quran',
      '/baca — catat bacaan terakhir',
      '/target N — atur target ayat per hari (0 untuk hapus)',
      '/pengingatngaji HH:MM — pengingat ngaji harian (off untuk matikan)',
      '/batal — batalkan proses yang sedang berjalan',
      '',
      'Semoga istiqomah! 🤲'
    ].join('\n');
  }

  trackerText(params: { now: Date; placeLabel: string; status: DayStatus; times: PrayerTimes | null }): string {
    const doneCount = PRAYER_NAMES.filter((name) => params.status[name]).length;
    const lines = [
      `🕌 Tracker Solat — ${this.longDate(params.now)}`,
      `📍 ${params.placeLabel} | ✅ ${doneCount}/5 solat`,
      '',
      'Jadwal & Status Hari Ini:'
    ];

    for (const name of PRAYER_NAMES) {
      const time = params.times ? params.times[name] : UNAVAILABLE;
      lines.push(`${statusMark(params.status[name])} ${PRAYER_EMOJI[name]} ${name} — ${time}`);
    }

    lines.push('', 'Tap tombol di bawah untuk tandai sudah solat 👇');
    return lines.join('\n');
  }

  trackerKeyboard(status: DayStatus): InlineKeyboardMarkup {
    const rows: InlineKeyboardButton[][] = PRAYER_NAMES.map((name) => [
      { text: `${statusMark(status[name])} ${PRAYER_EMOJI[name]} ${name}`, callback_data: CALLBACK.toggle(name) }
    ]);
    rows.push([{ text: '🔄 Refresh', callback_data: CALLBACK.REFRESH }]);
    return { inline_keyboard: rows };
  }

  scheduleText(params: { now: Date; placeLabel: string; times: PrayerTimes | null }): string {
    const lines = [`🕌 Jadwal Solat ${params.placeLabel}`, `📅 ${this.shortDate(params.now)}`, ''];

    if (!params.times) {
      lines.push(`Jadwal solat ${UNAVAILABLE}. Coba lagi nanti.`);
      return lines.join('\n');
    }

    for (const name of PRAYER_NAMES) {
      lines.push(`${PRAYER_EMOJI[name]} ${name}: ${params.times[name]}`);
    }
    return lines.join('\n');
  }

  recapText(summary: ChecklistSummary): string {
    const missedCount = summary.missedNames.length;
    let closing: string;
    if (summary.doneCount === PRAYER_NAMES.length) {
      closing = 'MasyaAllah, solat hari ini lengkap! 🎉🤲';
    } else if (summary.doneCount >= 3) {
      closing = 'Semangat, masih ada waktu untuk solat yang tertinggal! 💪';
    } else {
      closing = 'Yuk kejar solat yang belum! Semoga Allah mudahkan 🤲';
    }

    return [
      '📊 Rekap Solat Hari Ini',
      '',
      `✅ Sudah solat (${summary.doneCount}): ${listOrDash(summary.doneNames)}`,
      `⬜ Belum solat (${missedCount}): ${listOrDash(summary.missedNames)}`,
      '',
      closing
    ].join('\n');
  }

  remindersEnabledText(events: ScheduledEvent[]): string {
    if (events.length === 0) {
      return 'Semua waktu solat hari ini sudah lewat. Coba lagi besok!';
    }

    const lines = events.map((event) => `${PRAYER_EMOJI[event.eventName]} ${event.eventName} (${event.time})`);
    return ['✅ Pengingat solat aktif untuk hari ini!', '', ...lines].join('\n');
  }

  prayerReminderText(eventName: PrayerName): string {
    return `${PRAYER_EMOJI[eventName]} Waktunya ${eventName}! 🕌\n\nJangan lupa solat ya. Ketik /solat untuk tandai. 🤲`;
  }

  locationPromptText(currentPlace: string): string {
    return [
      `📍 Lokasi saat ini: ${currentPlace}`,
      '',
      'Kirim lokasi kamu lewat tombol di bawah supaya jadwal solat sesuai tempatmu.'
    ].join('\n');
  }

  locationKeyboard(): ReplyKeyboardMarkup {
    return {
      keyboard: [[{ text: LOCATION_BUTTON, request_location: true }]],
      resize_keyboard: true,
      one_time_keyboard: true
    };
  }

  locationSavedText(placeLabel: string, resolved: boolean): string {
    const note = resolved ? '' : `\n⚠️ Nama tempat ${UNAVAILABLE}, koordinat disimpan apa adanya.`;
    return `📍 Lokasi disimpan: ${placeLabel}.${note}\n\nKetik /jadwal untuk lihat jadwal solat.`;
  }

  readingStatusText(reading: ReadingState): string {
    const lines = ['📖 Progres Ngaji', ''];
    lines.push(`Terakhir dibaca: ${this.positionLabel(reading)}`);
    if (reading.updatedAt) {
      lines.push(`Diperbarui: ${this.dateTime(reading.updatedAt)}`);
    }
    lines.push(`Target harian: ${reading.dailyTarget > 0 ? `${reading.dailyTarget} ayat` : 'belum diatur'}`);
    lines.push(`Pengingat ngaji: ${reading.reminderTime ?? 'belum diatur'}`);
    return lines.join('\n');
  }

  readingStatusKeyboard(): InlineKeyboardMarkup {
    return { inline_keyboard: [[{ text: '✏️ Update bacaan', callback_data: CALLBACK.READING_START }]] };
  }

  readingReminderText(reading: ReadingState): string {
    const lines = ['📖 Waktunya ngaji! 🤲', '', `Terakhir dibaca: ${this.positionLabel(reading)}`];
    if (reading.dailyTarget > 0) {
      lines.push(`Target hari ini: ${reading.dailyTarget} ayat`);
    }
    lines.push('', 'Ketik /baca untuk catat bacaan terakhir.');
    return lines.join('\n');
  }

  surahPickerText(page: SurahPage): string {
    return `📖 Pilih surah yang terakhir kamu baca (halaman ${page.page + 1}/${page.lastPage + 1}):`;
  }

  surahPickerKeyboard(page: SurahPage): InlineKeyboardMarkup {
    const rows: InlineKeyboardButton[][] = [];
    for (let index = 0; index < page.items.length; index += 2) {
      rows.push(
        page.items.slice(index, index + 2).map((surah) => ({
          text: `${surah.number}. ${surah.name}`,
          callback_data: CALLBACK.selectionPick(surah.number)
        }))
      );
    }

    const nav: InlineKeyboardButton[] = [];
    if (page.hasPrev) {
      nav.push({ text: '⬅️ Sebelumnya', callback_data: CALLBACK.selectionPage(page.page - 1) });
    }
    if (page.hasNext) {
      nav.push({ text: 'Berikutnya ➡️', callback_data: CALLBACK.selectionPage(page.page + 1) });
    }
    if (nav.length) {
      rows.push(nav);
    }

    rows.push([{ text: '❌ Batal', callback_data: CALLBACK.SELECTION_CANCEL }]);
    return { inline_keyboard: rows };
  }

  ayahPromptText(surah: Surah, error: ValueError | null): string {
    const prompt = `Ketik nomor ayat terakhir yang kamu baca di QS. ${surah.name} (1–${surah.ayahs}), atau /batal.`;
    return error ? `⚠️ ${VALUE_ERROR_TEXT[error]}\n${prompt}` : `📖 QS. ${surah.name} dipilih.\n${prompt}`;
  }

  readingSavedText(surah: Surah, ayah: number): string {
    return `✅ Bacaan tersimpan: QS. ${surah.name} (${surah.number}) ayat ${ayah}. Barakallah! 🤲`;
  }

  cancelledText(hadSession: boolean): string {
    return hadSession ? '🙏 Oke, proses dibatalkan.' : 'Tidak ada proses yang sedang berjalan.';
  }

  private positionLabel(reading: ReadingState): string {
    const position = reading.lastPosition;
    if (!position) {
      return 'belum ada catatan';
    }
    const surah = findSurah(position.sectionId, this.catalog);
    const name = surah ? surah.name : `Surah ${position.sectionId}`;
    return `QS. ${name} (${position.sectionId}) ayat ${position.subPosition}`;
  }

  private longDate(now: Date): string {
    return getNowInTimezone(this.timezone, now).locale('id').format('dddd, D MMMM YYYY');
  }

  private shortDate(now: Date): string {
    return getNowInTimezone(this.timezone, now).locale('id').format('D MMMM YYYY');
  }

  private dateTime(iso: string): string {
    return getNowInTimezone(this.timezone, new Date(iso)).locale('id').format('D MMMM YYYY HH:mm');
  }
}

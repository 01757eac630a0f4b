export type CallbackAction =
  | { type: 'toggle'; eventName: string }
  | { type: 'refresh' }
  | { type: 'readingStart' }
  | { type: 'selectionPage'; page: number }
  | { type: 'selectionPick'; item: number }
  | { type: 'selectionCancel' };

export const CALLBACK = {
  REFRESH: 'refresh',
  READING_START: 'read_start',
  SELECTION_CANCEL: 'sel_cancel',
  toggle: (eventName: string) => `toggle_${eventName}`,
  selectionPage: (page: number) => `sel_page_${page}`,
  selectionPick: (item: number) => `sel_pick_${item}`
} as const;

export function parseCallbackData(data: string): CallbackAction | null {
  if (data === CALLBACK.REFRESH) {
    return { type: 'refresh' };
  }
  if (data === CALLBACK.READING_START) {
    return { type: 'readingStart' };
  }
  if (data === CALLBACK.SELECTION_CANCEL) {
    return { type: 'selectionCancel' };
  }
  if (data.startsWith('toggle_')) {
    return { type: 'toggle', eventName: data.slice('toggle_'.length) };
  }

  const page = data.match(/^sel_page_(\d+)$/);
  if (page) {
    return { type: 'selectionPage', page: Number(page[1]) };
  }

  const pick = data.match(/^sel_pick_(\d+)$/);
  if (pick) {
    return { type: 'selectionPick', item: Number(pick[1]) };
  }

  return null;
}

/**
 * Wire-format items as the fan collection API returns them
 */
export interface WireItem {
  added: string;
  band_name: string;
  album_id: number;
  album_title: string;
}

export function wireItem(albumId: number, overrides: Partial<WireItem> = {}): WireItem {
  return {
    added: "16 Oct 2021 17:46:42 GMT",
    band_name: `Band ${albumId}`,
    album_id: albumId,
    album_title: `Album ${albumId}`,
    ...overrides,
  };
}

export function wirePage(
  items: WireItem[],
  lastToken: string,
  moreAvailable: boolean,
): { items: WireItem[]; last_token: string; more_available: boolean } {
  return { items, last_token: lastToken, more_available: moreAvailable };
}

import { Position, SubtitleFormat } from '../subtitles/types';

/**
 * A subtitle document being edited, with the cursor the last edit left
 */
export interface EditingSession {
  id: string;
  name: string;
  format: SubtitleFormat;
  content: string;
  position: Position;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Session list response
 */
export interface SessionListItem {
  id: string;
  name: string;
  format: SubtitleFormat;
  size: number;
  createdAt: Date;
  updatedAt: Date;
}

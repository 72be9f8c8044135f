import { describe, it, expect } from 'vitest';
import {
  getVideoMimeType,
  getImageMimeType,
  isSupportedVideo,
  isSupportedImage,
} from './mime-types.js';

describe('mime-types utility', () => {
  describe('getVideoMimeType', () => {
    it('should map common video extensions', () => {
      expect(getVideoMimeType('/videos/job.mp4')).toBe('video/mp4');
      expect(getVideoMimeType('/videos/job.MOV')).toBe('video/quicktime');
      expect(getVideoMimeType('/videos/job.avi')).toBe('video/x-msvideo');
      expect(getVideoMimeType('/videos/job.mkv')).toBe('video/x-matroska');
    });

    it('should fall back to the default type', () => {
      expect(getVideoMimeType('/videos/job.xyz')).toBe('video/mp4');
      expect(getVideoMimeType('/videos/job', 'video/webm')).toBe('video/webm');
    });

    it('should not treat a dotted directory as an extension', () => {
      expect(getVideoMimeType('/data.mov/clip')).toBe('video/mp4');
    });
  });

  describe('getImageMimeType', () => {
    it('should map image extensions', () => {
      expect(getImageMimeType('note.jpg')).toBe('image/jpeg');
      expect(getImageMimeType('note.png')).toBe('image/png');
      expect(getImageMimeType('note.bmp')).toBe('image/jpeg');
    });
  });

  describe('support checks', () => {
    it('should accept supported videos only', () => {
      expect(isSupportedVideo('a.mp4')).toBe(true);
      expect(isSupportedVideo('a.txt')).toBe(false);
    });

    it('should accept supported images only', () => {
      expect(isSupportedImage('a.jpeg')).toBe(true);
      expect(isSupportedImage('a.gif')).toBe(false);
    });
  });
});

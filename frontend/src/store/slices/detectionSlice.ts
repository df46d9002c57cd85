import { createSlice, type PayloadAction } from '@reduxjs/toolkit';
import type { FeatureRect, ImageSize, MappedRect } from '../../types';

interface DetectionSliceState {
  // View-space rectangles currently drawn over the image
  overlays: MappedRect[];
  // Image-space frames of the last detection, kept so overlays can be re-laid out
  frames: FeatureRect[];
  frameImageSize: ImageSize | null;
  resultsText: string | null;
  isProcessing: boolean;
}

const initialState: DetectionSliceState = {
  overlays: [],
  frames: [],
  frameImageSize: null,
  resultsText: null,
  isProcessing: false,
};

const detectionSlice = createSlice({
  name: 'detection',
  initialState,
  reducers: {
    startDetection: (state) => {
      state.isProcessing = true;
    },

    addOverlay: (state, action: PayloadAction<MappedRect>) => {
      state.overlays.push(action.payload);
    },

    clearOverlays: (state) => {
      state.overlays = [];
    },

    setDetectedFrames: (state, action: PayloadAction<{ frames: FeatureRect[]; imageSize: ImageSize }>) => {
      state.frames = action.payload.frames;
      state.frameImageSize = action.payload.imageSize;
    },

    setResultsText: (state, action: PayloadAction<string | null>) => {
      state.resultsText = action.payload;
    },

    finishDetection: (state) => {
      state.isProcessing = false;
    },

    // Picking a new photo or switching models wipes the previous results
    resetResults: (state) => {
      state.overlays = [];
      state.frames = [];
      state.frameImageSize = null;
      state.resultsText = null;
    },
  },
});

export const {
  startDetection,
  addOverlay,
  clearOverlays,
  setDetectedFrames,
  setResultsText,
  finishDetection,
  resetResults,
} = detectionSlice.actions;

export default detectionSlice.reducer;

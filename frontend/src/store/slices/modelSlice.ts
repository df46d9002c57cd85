import { createSlice, type PayloadAction } from '@reduxjs/toolkit';
import type { ModelIndex } from '../../utils/DetectorService';

interface ModelSliceState {
  selectedIndex: ModelIndex;
  isLoading: boolean;
  // Name of the model that actually loaded, which may be the bundled fallback
  loadedModel: string | null;
}

const initialState: ModelSliceState = {
  selectedIndex: 0,
  isLoading: false,
  loadedModel: null,
};

const modelSlice = createSlice({
  name: 'model',
  initialState,
  reducers: {
    selectModel: (state, action: PayloadAction<ModelIndex>) => {
      state.selectedIndex = action.payload;
    },

    setModelLoading: (state) => {
      state.isLoading = true;
    },

    setModelLoaded: (state, action: PayloadAction<string>) => {
      state.isLoading = false;
      state.loadedModel = action.payload;
    },

    setModelLoadFailed: (state) => {
      state.isLoading = false;
      state.loadedModel = null;
    },
  },
});

export const {
  selectModel,
  setModelLoading,
  setModelLoaded,
  setModelLoadFailed,
} = modelSlice.actions;

export default modelSlice.reducer;

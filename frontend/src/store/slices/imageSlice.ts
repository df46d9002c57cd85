import { createSlice, type PayloadAction } from '@reduxjs/toolkit';
import type { PickedImage } from '../../types';

export type ImageStatus = 'idle' | 'loading' | 'ready' | 'error';

interface ImageSliceState {
  current: PickedImage | null;
  status: ImageStatus;
  error: string | null;
  cameraAvailable: boolean;
}

const initialState: ImageSliceState = {
  current: null,
  status: 'idle',
  error: null,
  cameraAvailable: false,
};

const imageSlice = createSlice({
  name: 'image',
  initialState,
  reducers: {
    setImageLoading: (state) => {
      state.status = 'loading';
      state.error = null;
    },

    setImage: (state, action: PayloadAction<PickedImage>) => {
      state.current = action.payload;
      state.status = 'ready';
      state.error = null;
    },

    setImageError: (state, action: PayloadAction<string>) => {
      state.error = action.payload;
      state.status = 'error';
    },

    setCameraAvailable: (state, action: PayloadAction<boolean>) => {
      state.cameraAvailable = action.payload;
    },
  },
});

export const {
  setImageLoading,
  setImage,
  setImageError,
  setCameraAvailable,
} = imageSlice.actions;

export default imageSlice.reducer;

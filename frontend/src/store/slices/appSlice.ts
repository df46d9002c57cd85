import { createSlice } from '@reduxjs/toolkit';

interface AppSliceState {
  isDetectionMenuOpen: boolean;
  debugMode: boolean;
}

const initialState: AppSliceState = {
  isDetectionMenuOpen: false,
  debugMode: import.meta.env.DEV,
};

const appSlice = createSlice({
  name: 'app',
  initialState,
  reducers: {
    openDetectionMenu: (state) => {
      state.isDetectionMenuOpen = true;
    },

    closeDetectionMenu: (state) => {
      state.isDetectionMenuOpen = false;
    },
  },
});

export const {
  openDetectionMenu,
  closeDetectionMenu,
} = appSlice.actions;

export default appSlice.reducer;

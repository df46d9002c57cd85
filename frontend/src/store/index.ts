import { combineReducers, configureStore } from '@reduxjs/toolkit';
import imageReducer from './slices/imageSlice';
import detectionReducer from './slices/detectionSlice';
import modelReducer from './slices/modelSlice';
import appReducer from './slices/appSlice';

const rootReducer = combineReducers({
  image: imageReducer,
  detection: detectionReducer,
  model: modelReducer,
  app: appReducer,
});

export type RootState = ReturnType<typeof rootReducer>;

export function createAppStore(preloadedState?: Partial<RootState>) {
  return configureStore({
    reducer: rootReducer,
    preloadedState,
  });
}

export const store = createAppStore();

export type AppStore = ReturnType<typeof createAppStore>;
export type AppDispatch = AppStore['dispatch'];

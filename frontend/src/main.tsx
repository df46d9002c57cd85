import React from 'react';
import ReactDOM from 'react-dom/client';
import { Provider } from 'react-redux';
import App from './App';
import { store } from './store';
import { loadVisionConfig } from './config/visionConfig';
import { createDetectorService } from './utils/DetectorService';
import { configureOnnxRuntime } from './utils/ModelManager';

configureOnnxRuntime();

const config = loadVisionConfig(import.meta.env);
const service = createDetectorService(config);

if (!config.cloudVision.apiKey) {
  console.warn('⚠️ VITE_CLOUD_VISION_API_KEY is not set; cloud detectors are disabled');
}

const container = document.getElementById('root');
if (!container) {
  throw new Error('Root element #root not found');
}

ReactDOM.createRoot(container).render(
  <React.StrictMode>
    <Provider store={store}>
      <App config={config} service={service} />
    </Provider>
  </React.StrictMode>
);

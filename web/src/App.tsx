import { X } from 'lucide-react';
import { ActivityPanel } from './components/ActivityPanel';
import { CameraSurface } from './components/CameraSurface';
import { ControlPanel } from './components/ControlPanel';
import { Header } from './components/Header';
import { useCameraStream } from './hooks/useCameraStream';

const App = () => {
  const camera = useCameraStream();

  return (
    <div className="min-h-screen">
      <Header />
      <main className="mx-auto flex w-full max-w-6xl flex-col gap-8 px-6 pb-16">
        {camera.lastError && (
          <div className="flex items-center justify-between rounded-2xl border border-rose-500/40 bg-rose-500/10 px-4 py-3 text-sm text-rose-100">
            <span>{camera.lastError}</span>
            <button type="button" onClick={camera.resetError} aria-label="Dismiss">
              <X className="h-4 w-4" />
            </button>
          </div>
        )}
        <div className="grid gap-6 lg:grid-cols-[1.6fr_0.7fr]">
          <CameraSurface camera={camera} />
          <div className="space-y-6">
            <ControlPanel viewerMode={camera.mode} />
            <ActivityPanel activity={camera.activity} />
          </div>
        </div>
      </main>
    </div>
  );
};

export default App;

import React, { useEffect, useState } from 'react';
import type { Theme } from './types/look';
import type { AppServices } from './services/appServices';
import { countSelected } from './services/accessorySelection';
import { downloadDataUrl, lookImageFileName, readFileAsDataUrl } from './utils/download';
import { errorMessage } from './services/errors';
import { useAccessorySelection, useLooks } from './src/hooks';
import { AccessoryGallery } from './components/AccessoryGallery';
import { OutfitList } from './components/OutfitList';
import { LooksToolbar } from './components/LooksToolbar';
import { LooksGrid } from './components/LooksGrid';
import { SaveLookModal } from './components/SaveLookModal';
import { CameraCapture, type CameraDevices } from './components/CameraCapture';

export type AppSection = 'accessory-gallery' | 'my-looks';

type AvatarSource = 'upload' | 'camera';

export const PLACEHOLDER_AVATAR_IMAGE = 'assets/images/placeholder-avatar.svg';

interface AppProps {
  services: Pick<AppServices, 'looks' | 'session' | 'catalog' | 'features' | 'setFeature'>;
  /** Defaults to navigator.mediaDevices */
  mediaDevices?: CameraDevices;
}

const SECTIONS: { id: AppSection; label: string }[] = [
  { id: 'accessory-gallery', label: '🧥 Accessory Gallery' },
  { id: 'my-looks', label: '📁 My Looks' },
];

const App: React.FC<AppProps> = ({ services, mediaDevices }) => {
  const { looks: store, session, catalog } = services;

  const [section, setSection] = useState<AppSection>('accessory-gallery');
  const [theme, setTheme] = useState<Theme>(() => session.getTheme());
  const [isSaveOpen, setIsSaveOpen] = useState(false);
  const [notice, setNotice] = useState<{ kind: 'info' | 'error'; text: string } | null>(null);
  const [avatarSource, setAvatarSource] = useState<AvatarSource>('upload');
  const [debugLogs, setDebugLogs] = useState(services.features.DEBUG_LOGS);

  const looks = useLooks(store);
  const outfit = useAccessorySelection(session);

  useEffect(() => {
    document.documentElement.setAttribute('data-theme', theme);
  }, [theme]);

  const toggleTheme = () => {
    const next: Theme = theme === 'dark' ? 'light' : 'dark';
    session.setTheme(next);
    setTheme(next);
  };

  const handleAvatarFile = async (event: React.ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0];
    if (!file) return;
    try {
      outfit.setAvatar(await readFileAsDataUrl(file));
    } catch (error) {
      setNotice({ kind: 'error', text: `Error reading image: ${errorMessage(error)}` });
    }
  };

  const handleCapture = (dataUrl: string) => {
    outfit.setAvatar(dataUrl);
    setAvatarSource('upload');
  };

  const handleDownloadLook = () => {
    if (!outfit.avatar) return;
    downloadDataUrl(lookImageFileName(outfit.avatar), outfit.avatar);
  };

  const toggleDebugLogs = () => {
    services.setFeature('DEBUG_LOGS', !debugLogs);
    setDebugLogs(!debugLogs);
  };

  const handleSave = (name: string, notes: string): string | null => {
    const result = looks.saveLook({
      name,
      notes,
      previewReference: outfit.avatar ?? undefined,
      accessorySelection: outfit.selection,
    });
    if (!result.ok) return result.message;
    setNotice({ kind: 'info', text: `Saved "${result.value.name}"` });
    setSection('my-looks');
    return null;
  };

  const handleView = (id: string) => {
    const look = looks.getLook(id);
    if (!look) return;
    const selection = session.applyLook(look);
    outfit.applySelection(selection, look.previewReference ?? outfit.avatar);
    setSection('accessory-gallery');
  };

  const handleImport = async (file: File) => {
    const result = await looks.importFile(file);
    setNotice(result.ok
      ? { kind: 'info', text: `Successfully imported ${result.value.imported} looks.` }
      : { kind: 'error', text: result.message });
  };

  return (
    <div className="min-h-screen p-8">
      <div className="max-w-6xl mx-auto">
        <header className="flex items-center justify-between mb-8">
          <h1 className="text-3xl font-bold text-[var(--color-text)]">👗 Try-On Looks Studio</h1>
          <label className="flex items-center gap-2 text-sm cursor-pointer">
            <input type="checkbox" checked={theme === 'dark'} onChange={toggleTheme} aria-label="Dark mode" />
            🌙 Dark mode
          </label>
        </header>

        <nav className="flex gap-2 mb-6" role="tablist">
          {SECTIONS.map(s => (
            <button
              key={s.id}
              type="button"
              role="tab"
              aria-selected={section === s.id}
              onClick={() => setSection(s.id)}
              className={`px-4 py-2 rounded-md text-sm ${
                section === s.id ? 'bg-[var(--color-primary)] text-white' : 'bg-[var(--color-surface)]'
              }`}
            >
              {s.label}
            </button>
          ))}
        </nav>

        {!looks.syncStatus.synced && (
          <div role="alert" className="mb-4 p-3 rounded-md text-xs bg-yellow-900/30 border border-yellow-700 text-yellow-300">
            ⚠️ Your looks could not be saved to this browser: {looks.syncStatus.lastError?.message}
            <button type="button" onClick={() => looks.retrySync()} className="ml-3 underline">
              Retry
            </button>
          </div>
        )}

        {notice && (
          <div
            role="status"
            className={`mb-4 p-3 rounded-md text-xs ${
              notice.kind === 'error'
                ? 'bg-red-900/30 border border-red-700 text-red-300'
                : 'bg-green-900/30 border border-green-700 text-green-300'
            }`}
          >
            {notice.text}
          </div>
        )}

        {section === 'accessory-gallery' ? (
          <section className="grid grid-cols-1 lg:grid-cols-3 gap-6">
            <div className="glass-card rounded-xl p-4">
              <div className="flex gap-2 mb-3" role="group" aria-label="Avatar source">
                {(['upload', 'camera'] as const).map(source => (
                  <button
                    key={source}
                    type="button"
                    aria-pressed={avatarSource === source}
                    onClick={() => setAvatarSource(source)}
                    className={`flex-1 px-3 py-1.5 rounded-md text-xs ${
                      avatarSource === source ? 'bg-[var(--color-primary)] text-white' : 'bg-[var(--color-surface)]'
                    }`}
                  >
                    {source === 'upload' ? '🖼️ Upload' : '📷 Camera'}
                  </button>
                ))}
              </div>
              {avatarSource === 'camera' ? (
                <CameraCapture onCapture={handleCapture} mediaDevices={mediaDevices} />
              ) : (
                <>
                  <img
                    id="accessorized-avatar"
                    src={outfit.avatar ?? PLACEHOLDER_AVATAR_IMAGE}
                    alt="Avatar"
                    className="w-full rounded-lg mb-3"
                  />
                  <label className="block text-sm mb-3 cursor-pointer">
                    📂 Choose avatar image
                    <input type="file" accept="image/*" onChange={e => void handleAvatarFile(e)} className="hidden" />
                  </label>
                </>
              )}
              <h3 className="text-sm font-bold mb-2">Current outfit ({countSelected(outfit.selection)})</h3>
              <OutfitList
                catalog={catalog}
                selection={outfit.selection}
                onRemove={outfit.remove}
                onClear={outfit.clear}
              />
              <button
                type="button"
                onClick={() => setIsSaveOpen(true)}
                className="mt-4 w-full px-4 py-2 rounded-md bg-[var(--color-primary)] text-white"
              >
                💾 Save Look
              </button>
              <button
                type="button"
                onClick={handleDownloadLook}
                disabled={!outfit.avatar}
                className="secondary-btn mt-2 w-full px-4 py-2 rounded-md bg-[var(--color-surface)] disabled:opacity-50"
              >
                ⬇️ Download Look
              </button>
            </div>
            <div className="lg:col-span-2">
              <AccessoryGallery catalog={catalog} selection={outfit.selection} onSelect={outfit.select} />
            </div>
          </section>
        ) : (
          <section>
            <LooksToolbar
              query={looks.query}
              sortKey={looks.sortKey}
              onQueryChange={looks.setQuery}
              onSortChange={looks.setSortKey}
              onExport={() => looks.exportLooks()}
              onImport={file => void handleImport(file)}
              exportDisabled={looks.totalCount === 0}
            />
            <LooksGrid
              looks={looks.looks}
              totalCount={looks.totalCount}
              query={looks.query}
              onView={handleView}
              onDelete={looks.deleteLook}
            />
          </section>
        )}

        <SaveLookModal
          isOpen={isSaveOpen}
          onClose={() => setIsSaveOpen(false)}
          onSave={handleSave}
          canSave={outfit.avatar !== null}
        />

        <footer className="mt-10 text-xs text-[var(--color-text-tertiary)]">
          <label className="inline-flex items-center gap-2 cursor-pointer">
            <input type="checkbox" checked={debugLogs} onChange={toggleDebugLogs} />
            🔧 Debug logs (applies after reload)
          </label>
        </footer>
      </div>
    </div>
  );
};

export default App;

import { NavLink, Route, Routes } from "react-router-dom";
import { useEffect } from "react";
import { useTranslation } from "react-i18next";
import { DesignerPage } from "./pages/DesignerPage";
import { ExportPage } from "./pages/ExportPage";
import { ErrorBoundary } from "./components/layout/ErrorBoundary";
import { ErrorModal } from "./components/layout/ErrorModal";
import { useUiSettingsStore, type Language } from "./stores/ui-settings-store";
import { useSkinStore } from "./stores/skin-store";

const LANGUAGES: readonly Language[] = ["en", "ko"];

export default function App(): JSX.Element {
  const language = useUiSettingsStore((s) => s.language);
  const setLanguage = useUiSettingsStore((s) => s.setLanguage);
  const load = useSkinStore((s) => s.load);
  const { t, i18n } = useTranslation();

  const tabs = [
    { to: "/", label: t("tab_designer") },
    { to: "/export", label: t("tab_export") },
  ];

  useEffect(() => {
    void load();
  }, [load]);

  useEffect(() => {
    void i18n.changeLanguage(language);
  }, [i18n, language]);

  return (
    <div className="app-shell">
      <ErrorModal />
      <header className="topbar">
        <div className="topbar-main">
          <h1>{t("app_title")}</h1>
          <label className="header-scope">
            {t("common_language")}
            <select
              value={language}
              onChange={(e) => {
                const next = LANGUAGES.find((lang) => lang === e.target.value);
                if (next) setLanguage(next);
              }}
            >
              {LANGUAGES.map((lang) => (
                <option key={lang} value={lang}>
                  {t(`language_${lang}`)}
                </option>
              ))}
            </select>
          </label>
        </div>
        <nav className="tabs">
          {tabs.map((tab) => (
            <NavLink key={tab.to} to={tab.to} end className={({ isActive }) => (isActive ? "tab active" : "tab")}>
              {tab.label}
            </NavLink>
          ))}
        </nav>
      </header>
      <main className="page">
        <ErrorBoundary>
          <Routes>
            <Route path="/" element={<DesignerPage />} />
            <Route path="/export" element={<ExportPage />} />
          </Routes>
        </ErrorBoundary>
      </main>
    </div>
  );
}

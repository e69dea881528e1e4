import { useTranslation } from "react-i18next";
import type { SpriteFilenames, TintKey } from "@outfit-forge/shared-schema";
import { useErrorStore } from "../stores/error-store";
import { useSkinStore } from "../stores/skin-store";

const FILE_SLOTS: ReadonlyArray<keyof SpriteFilenames> = ["base", "hands", "feet", "backpack", "loot", "border", "inner", "front"];
const TINT_KEYS: readonly TintKey[] = ["base", "hand", "foot", "backpack", "loot", "border"];

export function ExportPage(): JSX.Element {
  const { t } = useTranslation();
  const result = useSkinStore((s) => s.result);
  const downloading = useSkinStore((s) => s.downloading);
  const download = useSkinStore((s) => s.download);
  const pushError = useErrorStore((s) => s.pushError);

  if (!result) return <p className="hint">{t("export_empty")}</p>;

  const copyConfig = async (): Promise<void> => {
    try {
      await navigator.clipboard.writeText(result.config_block);
    } catch (e) {
      pushError(t("export_title"), e, t("export_copy_failed"));
    }
  };

  return (
    <div className="export-grid">
      <section className="panel">
        <div className="panel-header">
          <h3>{t("export_title")}</h3>
          <code>{result.ident}</code>
        </div>
        <div className="panel-actions">
          <button disabled={downloading} onClick={() => void download(false)}>
            {t("export_download_full")}
          </button>
          <button disabled={downloading} onClick={() => void download(true)}>
            {t("export_download_sprites")}
          </button>
        </div>
        <h4>{t("export_filenames")}</h4>
        <table className="kv-table">
          <tbody>
            {FILE_SLOTS.map((slot) => {
              const name = result.filenames[slot];
              if (name === undefined) return null;
              return (
                <tr key={slot}>
                  <th>{slot}</th>
                  <td>
                    <code>{name}</code>
                  </td>
                </tr>
              );
            })}
          </tbody>
        </table>
        <h4>{t("export_tints")}</h4>
        <table className="kv-table">
          <thead>
            <tr>
              <th />
              <th>{t("export_tint_ui")}</th>
              <th>{t("export_tint_export")}</th>
            </tr>
          </thead>
          <tbody>
            {TINT_KEYS.map((key) => (
              <tr key={key}>
                <th>{key}</th>
                <td>
                  <code>{result.tints.ui[key]}</code>
                </td>
                <td>
                  <code>{result.tints.export[key]}</code>
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      </section>
      <section className="panel">
        <div className="panel-header">
          <h3>{t("export_config_block")}</h3>
          <button className="list-btn" onClick={() => void copyConfig()}>
            {t("export_copy")}
          </button>
        </div>
        <pre className="code-block">{result.config_block}</pre>
        <h3>{t("export_manifest")}</h3>
        <pre className="code-block">{result.manifest}</pre>
        <h3>{t("export_archive_contents")}</h3>
        <ul className="archive-list">
          {result.archive_contents.map((name) => (
            <li key={name}>
              <code>{name}</code>
            </li>
          ))}
        </ul>
      </section>
    </div>
  );
}

import { useTranslation } from "react-i18next";
import { useErrorStore } from "../../stores/error-store";

export function ErrorModal(): JSX.Element | null {
  const { t } = useTranslation();
  const errors = useErrorStore((s) => s.errors);
  const dismiss = useErrorStore((s) => s.dismiss);
  const clear = useErrorStore((s) => s.clear);

  if (errors.length === 0) return null;

  return (
    <div className="error-modal-overlay" role="alertdialog" aria-modal="true">
      <div className="error-modal">
        <div className="error-modal-header">
          <h3>{t("error_modal_title", { count: errors.length })}</h3>
          <button className="error-modal-close" onClick={clear}>
            {t("error_modal_close_all")}
          </button>
        </div>
        <ul className="error-modal-list">
          {errors.map((err) => (
            <li key={err.id} className="error-modal-item">
              <div className="error-modal-item-head">
                <strong>{err.title}</strong>
                <button aria-label={t("error_modal_dismiss")} onClick={() => dismiss(err.id)}>
                  &times;
                </button>
              </div>
              <p>{err.message}</p>
            </li>
          ))}
        </ul>
      </div>
    </div>
  );
}

import i18n from "i18next";
import { initReactI18next } from "react-i18next";
import { loadLanguage } from "../stores/ui-settings-store";
import en from "./locales/en.json";
import ko from "./locales/ko.json";

const resources = {
  ko: { translation: ko },
  en: { translation: en }
};

void i18n.use(initReactI18next).init({
  resources,
  lng: loadLanguage(),
  fallbackLng: "en",
  interpolation: { escapeValue: false }
});

export default i18n;

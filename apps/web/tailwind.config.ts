import type { Config } from "tailwindcss";
import plugin from "tailwindcss/plugin";

const config: Config = {
  darkMode: ["class"],
  content: [
    "./app/**/*.{ts,tsx}",
    "../../packages/ui/src/**/*.{ts,tsx}"
  ],
  theme: {
    extend: {
      colors: {
        accent: {
          DEFAULT: "#667eea",
          deep: "#764ba2"
        },
        panel: "#252526",
        surface: "#1e1e1e"
      }
    }
  },
  plugins: [
    require("tailwindcss-animate"),
    plugin(({ addUtilities }) => {
      addUtilities({
        ".text-glow": {
          textShadow: "0 0 12px rgba(102,126,234,0.45)"
        }
      });
    })
  ]
};

export default config;

import type { Config } from "tailwindcss";

const config: Config = {
  content: ["./app/**/*.{ts,tsx}"],
  theme: {
    extend: {
      colors: {
        ink: "#111827",
        mist: "#F8FAFC",
        accent: "#0B7285",
        danger: "#B42318"
      }
    }
  },
  plugins: []
};

export default config;

export const FEATURE_CATEGORIES = [
  "Core Features",
  "User Experience",
  "Technical Capabilities",
  "Integration Features",
  "Security & Privacy",
  "Analytics & Reporting",
  "Mobile & Remote Access",
];

export const OTHER_CATEGORY = "Other";

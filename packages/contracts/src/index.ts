export * from "./schema/weather_record_v1";
export * from "./schema/anomaly_v1";
export * from "./schema/insight_report_v1";

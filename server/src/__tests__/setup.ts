import { Logger } from "../logging/logger";

Logger.configure({ enabled: false });

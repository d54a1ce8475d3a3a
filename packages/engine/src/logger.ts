import bunyan from "bunyan";
import config from "./config";

const log = bunyan.createLogger({
  name: config.logName,
  level: config.logLevel,
});

export default log;

import { consoleConfiguration, printListing } from "./console";
import { createLogger } from "./logger";

const log = createLogger();

try {
    const produced = printListing(consoleConfiguration, text => process.stdout.write(text));
    if (produced < consoleConfiguration.slotCount) {
        log.warn({ requested: consoleConfiguration.slotCount, produced }, 'Fewer slots than requested');
    }
} catch (err) {
    log.error(err);
    process.exitCode = 1;
}

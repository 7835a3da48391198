import { log } from 'crawlee';

log.setLevel(log.LEVELS.OFF);

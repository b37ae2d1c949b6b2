import { log } from 'crawlee';

// 테스트 출력에 크롤러 로그가 섞이지 않도록
log.setLevel(log.LEVELS.OFF);

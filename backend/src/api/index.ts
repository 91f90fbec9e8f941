import './health';
import './loginHandoff';

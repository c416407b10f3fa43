// Angular ships partially compiled declarations; the JIT compiler links them when specs load.
import '@angular/compiler';
